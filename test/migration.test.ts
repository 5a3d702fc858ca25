import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import fs from 'fs';
import { MigrationOrchestrator } from '../src/classes/orchestrator';
import type { RemoteSession, ServerEndpoint } from '../src/interfaces';
import { MigrationLogger } from '../src/lib/logger';
import { FakeSession, WP_CONFIG_FIXTURE, tempPath } from './helpers/fake-session';
import { ScriptedPrompter } from './helpers/scripted-prompter';

const DUMP = '/tmp/wp_migration_backup/wordpress_db_20240115_103000.sql';

describe('WordPress migration', () => {
  const logFile = tempPath('migration.log');
  const relayPath = tempPath('migration-relay.tmp');
  let source: FakeSession;
  let destination: FakeSession;
  let prompter: ScriptedPrompter;
  let opened: string[];

  function orchestrator(): MigrationOrchestrator {
    return new MigrationOrchestrator({
      prompter,
      logger: new MigrationLogger({ filePath: logFile, console: false }),
      openSession: async (endpoint: ServerEndpoint): Promise<RemoteSession> => {
        opened.push(endpoint.label);
        return endpoint.label === 'source' ? source : destination;
      },
      relayPath,
      now: () => new Date(2024, 0, 15, 10, 30, 0),
    });
  }

  function logLines(): string[] {
    return fs
      .readFileSync(logFile, 'utf8')
      .trimEnd()
      .split('\n')
      .map((line) => line.replace(/^\S+ - [A-Z]+ - /, ''));
  }

  function stages(): string[] {
    return logLines().filter((line) => line.startsWith('[STAGE]'));
  }

  beforeEach(() => {
    fs.rmSync(logFile, { force: true });
    opened = [];
    prompter = new ScriptedPrompter();
    source = new FakeSession('source')
      .on('cat ', { stdout: WP_CONFIG_FIXTURE })
      .on('$wp_version', { stdout: "$wp_version = '6.4.2';" })
      .on('du -sm', { stdout: '120' });
    destination = new FakeSession('destination')
      .on('php -v', { stdout: '8.1.2' })
      .on('df -m', { stdout: '10240' })
      .on('wc -l', { stdout: '1520' });
  });

  afterEach(() => {
    fs.rmSync(logFile, { force: true });
    fs.rmSync(relayPath, { force: true });
  });

  it('should migrate the site and log every stage in order', async () => {
    const code = await orchestrator().run();

    expect(code).to.equal(0);
    expect(stages()).to.deep.equal([
      '[STAGE] validation completed',
      '[STAGE] database completed',
      '[STAGE] filesystem completed',
      '[STAGE] post-migration completed',
    ]);
    expect(prompter.asked).to.deep.equal([
      'serverEndpoints',
      'confirm: Proceed with these settings?',
      'migrationParameters',
      'destinationDatabase',
      'destinationInstallPath',
      'webServerUser',
    ]);
    expect(opened).to.deep.equal(['source', 'destination', 'source', 'destination']);
    expect(source.closeCount).to.equal(2);
    expect(destination.closeCount).to.equal(2);
    expect(destination.ran("php -l '/var/www/html/wp-config.php'")).to.equal(true);
    expect(logLines()).to.include('Your site should be reachable at: https://new.example');
  });

  it('should exit cleanly when the operator declines', async () => {
    prompter.confirmAnswer = false;

    const code = await orchestrator().run();

    expect(code).to.equal(0);
    expect(opened).to.deep.equal([]);
    expect(logLines()).to.deep.equal(['Configuration cancelled by user']);
  });

  it('should stop after validation when a check fails', async () => {
    destination.on('df -m', { stdout: '239' });

    const code = await orchestrator().run();

    expect(code).to.equal(1);
    expect(stages()).to.deep.equal([]);
    expect(opened).to.deep.equal(['source', 'destination']);
    expect(prompter.asked).to.not.include('migrationParameters');
  });

  it('should continue when the destination database cannot be created', async () => {
    destination.on('CREATE DATABASE', {
      exitCode: 1,
      stderr: 'ERROR 1045 (28000): Access denied',
    });

    const code = await orchestrator().run();

    expect(code).to.equal(0);
    expect(logLines()).to.include(
      '! Could not create the database: ERROR 1045 (28000): Access denied. The database may need to be created manually'
    );
    expect(destination.ran(`< '${DUMP}'`)).to.equal(true);
    expect(stages()).to.have.lengthOf(4);
  });

  it('should abort before post-migration when permissions cannot be set', async () => {
    destination.on('chmod 755', { exitCode: 1, stderr: 'Operation not permitted' });

    const code = await orchestrator().run();

    expect(code).to.equal(1);
    expect(stages()).to.deep.equal([
      '[STAGE] validation completed',
      '[STAGE] database completed',
    ]);
    expect(destination.ran('php -l')).to.equal(false);
    expect(destination.ran('sed -i')).to.equal(false);
    expect(destination.closeCount).to.equal(2);
  });

  it('should point at manual fixes when post-migration fails', async () => {
    destination.on('php -l', { exitCode: 255, stdout: 'Parse error' });

    const code = await orchestrator().run();

    expect(code).to.equal(1);
    expect(logLines()).to.include(
      '✗ The database and files were migrated, but wp-config.php may need to be fixed manually.'
    );
    expect(stages()).to.have.lengthOf(3);
  });

  it('should close the sessions when a step throws', async () => {
    destination.on('gunzip', new Error('Connection lost'));

    const code = await orchestrator().run();

    expect(code).to.equal(1);
    expect(logLines()).to.include('✗ Import database failed: Connection lost');
    expect(source.closeCount).to.equal(2);
    expect(destination.closeCount).to.equal(2);
  });

  it('should log the cancellation when interrupted before any session is open', async () => {
    const migration = orchestrator();

    expect(await migration.interrupt()).to.equal(1);
    expect(logLines()).to.deep.equal(['✗ Operation cancelled by user (Ctrl+C)']);
  });

  it('should close the long-lived sessions once when interrupted mid-run', async () => {
    const migration = orchestrator();
    let interruptCode: number | null = null;
    prompter.onMigrationParameters = async () => {
      interruptCode = await migration.interrupt();
    };

    const code = await migration.run();

    expect(interruptCode).to.equal(1);
    expect(code).to.equal(1);
    expect(source.closeCount).to.equal(2);
    expect(destination.closeCount).to.equal(2);
    expect(source.ran('mysqldump')).to.equal(false);
    expect(stages()).to.deep.equal(['[STAGE] validation completed']);
    expect(logLines()).to.include('✗ Operation cancelled by user (Ctrl+C)');

    await migration.cleanup();

    expect(source.closeCount).to.equal(2);
    expect(destination.closeCount).to.equal(2);
  });
});
