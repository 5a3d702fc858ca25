import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import fs from 'fs';
import { MigrationLogger } from '../lib/logger';
import { fileTimestamp, formatDuration } from '../lib/timestamp';
import { tempPath } from '../../test/helpers/fake-session';

describe('MigrationLogger', () => {
  const logFile = tempPath('logger.log');
  const now = () => new Date(Date.UTC(2024, 0, 15, 10, 30, 0));

  beforeEach(() => {
    fs.rmSync(logFile, { force: true });
  });

  afterEach(() => {
    fs.rmSync(logFile, { force: true });
  });

  it('should append timestamped lines with their level', () => {
    const logger = new MigrationLogger({ filePath: logFile, console: false, now });

    logger.info('Starting');
    logger.warn('Disk almost full');
    logger.error('Import failed');
    logger.stage('database');

    expect(fs.readFileSync(logFile, 'utf8')).to.equal(
      '2024-01-15T10:30:00.000Z - INFO - Starting\n' +
        '2024-01-15T10:30:00.000Z - WARN - ! Disk almost full\n' +
        '2024-01-15T10:30:00.000Z - ERROR - ✗ Import failed\n' +
        '2024-01-15T10:30:00.000Z - INFO - [STAGE] database completed\n'
    );
  });

  it('should write a section as a title between two rules', () => {
    const logger = new MigrationLogger({ filePath: logFile, console: false, now });

    logger.section('Starting database migration');

    const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n');
    expect(lines).to.have.lengthOf(3);
    expect(lines[0]).to.equal(`2024-01-15T10:30:00.000Z - INFO - ${'='.repeat(60)}`);
    expect(lines[1]).to.equal('2024-01-15T10:30:00.000Z - INFO - Starting database migration');
  });

  it('should not touch the filesystem without a file path', () => {
    const logger = new MigrationLogger({ console: false });
    logger.success('done');
    expect(fs.existsSync(logFile)).to.equal(false);
  });
});

describe('timestamp', () => {
  it('should format local time for file names', () => {
    expect(fileTimestamp(new Date(2024, 0, 5, 9, 3, 7))).to.equal('20240105_090307');
  });

  it('should format durations', () => {
    expect(formatDuration(65000)).to.equal('1m 5s');
    expect(formatDuration(4500)).to.equal('4s');
  });
});
