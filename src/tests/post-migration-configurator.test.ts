import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { PostMigrationConfigurator } from '../classes/post-migration-configurator';
import { MigrationLogger } from '../lib/logger';
import {
  STOP_EDITING_SENTINEL,
  defineLine,
  directivePattern,
  hasDirectiveCommand,
  insertDirectiveCommand,
  phpString,
  replaceDirectiveCommand,
} from '../lib/wp-config';
import { FakeSession, exactly } from '../../test/helpers/fake-session';
import { DESTINATION_DATABASE } from '../../test/helpers/scripted-prompter';

const FILE = '/var/www/html/wp-config.php';

describe('PostMigrationConfigurator', () => {
  let destination: FakeSession;
  let configurator: PostMigrationConfigurator;

  beforeEach(() => {
    destination = new FakeSession('destination');
    configurator = new PostMigrationConfigurator(
      destination,
      new MigrationLogger({ console: false })
    );
  });

  it('should rewrite the credentials, rotate the salts and verify the file', async () => {
    const result = await configurator.configure({
      installPath: '/var/www/html',
      credentials: DESTINATION_DATABASE,
      enableDebug: false,
    });

    expect(result).to.deep.equal({
      ok: true,
      message: 'Post-migration tasks completed',
      value: undefined,
    });
    expect(destination.commands.slice(0, 4)).to.deep.equal([
      replaceDirectiveCommand(FILE, 'DB_NAME', "'new_db'").toString(),
      replaceDirectiveCommand(FILE, 'DB_USER', "'new_user'").toString(),
      replaceDirectiveCommand(FILE, 'DB_PASSWORD', "'test-secret'").toString(),
      replaceDirectiveCommand(FILE, 'DB_HOST', "'localhost'").toString(),
    ]);
    expect(destination.commands).to.include(
      replaceDirectiveCommand(FILE, 'WP_DEBUG', 'false').toString()
    );
    expect(destination.commands.slice(-3)).to.deep.equal([
      "test -f '/var/www/html/wp-config.php'",
      "stat -c '%a' '/var/www/html/wp-config.php'",
      "php -l '/var/www/html/wp-config.php'",
    ]);
  });

  it('should fail when a database directive is missing', async () => {
    destination.on("DB_HOST['", { exitCode: 1 });

    const result = await configurator.updateDatabaseCredentials(FILE, DESTINATION_DATABASE);

    expect(result).to.deep.equal({
      ok: false,
      message: 'Could not update DB_HOST: directive not found',
    });
  });

  it('should report how many secrets were rotated', async () => {
    destination.on('NONCE_SALT', { exitCode: 1 });

    const result = await configurator.rotateSecrets(FILE);

    expect(result.message).to.equal('Security keys and salts regenerated (7/8)');
    expect(destination.commands).to.have.lengthOf(8);
  });

  it('should add WP_DEBUG above the stop editing line when it is missing', async () => {
    destination.on(exactly(hasDirectiveCommand(FILE, 'WP_DEBUG')), { exitCode: 1 });

    const result = await configurator.setDebugMode(FILE, false);

    expect(result.message).to.equal('Debug mode disabled');
    expect(destination.commands).to.deep.equal([
      hasDirectiveCommand(FILE, 'WP_DEBUG').toString(),
      insertDirectiveCommand(
        FILE,
        STOP_EDITING_SENTINEL,
        'before',
        defineLine('WP_DEBUG', 'false')
      ).toString(),
    ]);
  });

  it('should fail when the stop editing line is missing', async () => {
    destination
      .on(exactly(hasDirectiveCommand(FILE, 'WP_DEBUG')), { exitCode: 1 })
      .on('stop editing', { exitCode: 1 });

    const result = await configurator.configure({
      installPath: '/var/www/html',
      credentials: DESTINATION_DATABASE,
      enableDebug: false,
    });

    expect(result).to.deep.equal({
      ok: false,
      message: `Could not add WP_DEBUG: "That's all, stop editing" line not found`,
    });
    expect(destination.ran('php -l')).to.equal(false);
  });

  it('should add the debug log settings when enabling debug', async () => {
    destination
      .on(exactly(hasDirectiveCommand(FILE, 'WP_DEBUG_LOG')), { exitCode: 1 })
      .on(exactly(hasDirectiveCommand(FILE, 'WP_DEBUG_DISPLAY')), { exitCode: 1 });

    const result = await configurator.setDebugMode(FILE, true);

    expect(result.message).to.equal('Debug mode enabled');
    expect(destination.commands).to.deep.equal([
      hasDirectiveCommand(FILE, 'WP_DEBUG').toString(),
      replaceDirectiveCommand(FILE, 'WP_DEBUG', 'true').toString(),
      hasDirectiveCommand(FILE, 'WP_DEBUG_LOG').toString(),
      insertDirectiveCommand(
        FILE,
        directivePattern('WP_DEBUG'),
        'after',
        defineLine('WP_DEBUG_LOG', 'true')
      ).toString(),
      hasDirectiveCommand(FILE, 'WP_DEBUG_DISPLAY').toString(),
      insertDirectiveCommand(
        FILE,
        directivePattern('WP_DEBUG_LOG'),
        'after',
        defineLine('WP_DEBUG_DISPLAY', 'false')
      ).toString(),
    ]);
  });

  it('should fail verification on a PHP syntax error', async () => {
    destination.on('php -l', {
      exitCode: 255,
      stdout: 'Errors parsing /var/www/html/wp-config.php',
    });

    const result = await configurator.verifyConfig(FILE);

    expect(result).to.deep.equal({
      ok: false,
      message:
        'PHP syntax error in /var/www/html/wp-config.php: Errors parsing /var/www/html/wp-config.php',
    });
  });

  it('should quote passwords as PHP strings', () => {
    expect(phpString("pa'ss")).to.equal("'pa\\'ss'");
  });
});
