import { PrivilegeError } from '../errors.js';

/** True when running as uid 0. Always false where uids do not exist. */
export function isRoot(): boolean {
  return process.getuid?.() === 0;
}

/** Throw a PrivilegeError unless running as root. */
export function requireRoot(action: string, isPrivileged: () => boolean = isRoot): void {
  if (!isPrivileged()) {
    throw new PrivilegeError(`${action} must be run as root. Please use sudo.`);
  }
}
