import { execFileSync } from 'node:child_process';

/** Runs a command to completion and returns stdout; throws on non-zero exit. */
export type ExecSyncFn = (command: string, args: string[]) => string;

/** The init-system operations the generator needs. Abstraction for testability. */
export interface InitSystem {
  /** Enable for future boots and start now. Throws when the command fails. */
  activate(unit: string): void;
  /** Reload unit definitions. Throws when the command fails. */
  reload(): void;
  /** Active state of a unit as reported by the init system, e.g. "active" */
  status(unit: string): string;
}

function defaultExec(command: string, args: string[]): string {
  return execFileSync(command, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: 30_000,
  });
}

/** `systemctl is-active` exits non-zero for anything but "active" and still prints the state. */
function stdoutOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'stdout' in err) {
    const { stdout } = err;
    if (typeof stdout === 'string' && stdout.trim()) return stdout.trim();
  }
  return undefined;
}

export function createSystemctl(exec: ExecSyncFn = defaultExec): InitSystem {
  return {
    activate(unit: string): void {
      exec('systemctl', ['enable', '--now', unit]);
    },
    reload(): void {
      exec('systemctl', ['daemon-reload']);
    },
    status(unit: string): string {
      try {
        return exec('systemctl', ['is-active', unit]).trim();
      } catch (err: unknown) {
        return stdoutOf(err) ?? 'unknown';
      }
    },
  };
}

/** Message of a failed init-system call, first line of stderr when there is one. */
export function describeExecError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    let text = '';
    if (typeof stderr === 'string') text = stderr;
    else if (Buffer.isBuffer(stderr)) text = stderr.toString('utf-8');
    const firstLine = text.trim().split('\n')[0];
    if (firstLine) return firstLine;
  }
  return err instanceof Error ? err.message : String(err);
}
