import { describe, expect, it } from 'vitest';
import { type ParserUnitValues, renderParserUnit } from './template.js';

const values: ParserUnitValues = {
  instanceId: 'stream701',
  baseUnit: 'checking_stream_quality_stream701.service',
  executablePath: '/usr/bin/node',
  workerScriptPath: '/opt/streamwire/csv-parser.js',
  dataFile: '/srv/csvs/stream701_prod.csv',
  outputFile: '/srv/csvs/stream701_prod.jsonl',
  logFile: '/var/log/parsers/csv_parser_stream701.log',
  workingDirectory: '/root',
  unbufferedEnv: 'STREAMWIRE_LOG_SYNC=1',
};

describe('renderParserUnit', () => {
  it('renders the full unit', () => {
    expect(renderParserUnit(values)).toBe(
      [
        '[Unit]',
        'Description=CSV to JSONL Parser Service for stream701',
        'After=checking_stream_quality_stream701.service',
        'BindsTo=checking_stream_quality_stream701.service',
        '',
        '[Service]',
        'Type=simple',
        'ExecStart=/usr/bin/node /opt/streamwire/csv-parser.js "/srv/csvs/stream701_prod.csv" "/srv/csvs/stream701_prod.jsonl" --log-file /var/log/parsers/csv_parser_stream701.log',
        'User=root',
        'WorkingDirectory=/root',
        'Restart=always',
        'Environment=STREAMWIRE_LOG_SYNC=1',
        '',
        '[Install]',
        'WantedBy=checking_stream_quality_stream701.service',
        '',
      ].join('\n'),
    );
  });

  it('is deterministic', () => {
    expect(renderParserUnit(values)).toBe(renderParserUnit({ ...values }));
  });
});
