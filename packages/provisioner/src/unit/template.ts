export interface ParserUnitValues {
  instanceId: string;
  /** Unit the parser is ordered after, bound to and installed into */
  baseUnit: string;
  executablePath: string;
  workerScriptPath: string;
  dataFile: string;
  outputFile: string;
  logFile: string;
  workingDirectory: string;
  /** `KEY=VALUE` */
  unbufferedEnv: string;
}

export function renderParserUnit(values: ParserUnitValues): string {
  const execStart = [
    values.executablePath,
    values.workerScriptPath,
    `"${values.dataFile}"`,
    `"${values.outputFile}"`,
    '--log-file',
    values.logFile,
  ].join(' ');

  return `[Unit]
Description=CSV to JSONL Parser Service for ${values.instanceId}
After=${values.baseUnit}
BindsTo=${values.baseUnit}

[Service]
Type=simple
ExecStart=${execStart}
User=root
WorkingDirectory=${values.workingDirectory}
Restart=always
Environment=${values.unbufferedEnv}

[Install]
WantedBy=${values.baseUnit}
`;
}
