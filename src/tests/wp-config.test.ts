import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  SECRET_CHARSET,
  SECRET_DIRECTIVES,
  STOP_EDITING_SENTINEL,
  configPath,
  defineLine,
  insertAfterProgram,
  insertBeforeProgram,
  parseDirectives,
  parseTablePrefix,
  parseWordPressVersion,
  phpString,
  replaceDirectiveCommand,
  replaceLineProgram,
  generateSecrets,
} from '../lib/wp-config';
import { WP_CONFIG_FIXTURE } from '../../test/helpers/fake-session';

describe('wp-config', () => {
  describe('parseDirectives', () => {
    it('should read database settings from a wp-config.php', () => {
      const directives = parseDirectives(WP_CONFIG_FIXTURE);

      expect(directives.get('DB_NAME')).to.equal('source_db');
      expect(directives.get('DB_USER')).to.equal('source_user');
      expect(directives.get('DB_PASSWORD')).to.equal('test-secret');
      expect(directives.get('DB_HOST')).to.equal('localhost');
      expect(directives.get('DB_COLLATE')).to.equal('');
    });

    it('should unescape quoted values and keep bare values as written', () => {
      const directives = parseDirectives(
        [
          "define('DB_PASSWORD', 'it\\'s');",
          'define("DB_HOST", "db.internal:3307");',
          'define( "WP_DEBUG", true );',
        ].join('\n')
      );

      expect(directives.get('DB_PASSWORD')).to.equal("it's");
      expect(directives.get('DB_HOST')).to.equal('db.internal:3307');
      expect(directives.get('WP_DEBUG')).to.equal('true');
    });
  });

  it('should read the table prefix, falling back to wp_', () => {
    expect(parseTablePrefix("$table_prefix = 'site_';")).to.equal('site_');
    expect(parseTablePrefix('<?php')).to.equal('wp_');
  });

  it('should read the WordPress version', () => {
    expect(parseWordPressVersion("$wp_version = '6.4.2';")).to.equal('6.4.2');
    expect(parseWordPressVersion('')).to.equal(null);
  });

  it('should build PHP string literals', () => {
    expect(phpString("it's \\ ok")).to.equal("'it\\'s \\\\ ok'");
  });

  it('should join the config path', () => {
    expect(configPath('/var/www/html')).to.equal('/var/www/html/wp-config.php');
  });

  describe('sed programs', () => {
    it('should replace the whole define line', () => {
      expect(
        replaceLineProgram('DB_NAME', defineLine('DB_NAME', phpString('new_db')))
      ).to.equal(
        "s/^.*define([[:space:]]*['\"]DB_NAME['\"].*$/define( 'DB_NAME', 'new_db' );/"
      );
    });

    it('should escape sed metacharacters in the replacement', () => {
      expect(
        replaceLineProgram('DB_PASSWORD', defineLine('DB_PASSWORD', phpString('a/b&c')))
      ).to.equal(
        "s/^.*define([[:space:]]*['\"]DB_PASSWORD['\"].*$/define( 'DB_PASSWORD', 'a\\/b\\&c' );/"
      );
    });

    it('should insert before the stop editing line', () => {
      expect(
        insertBeforeProgram(STOP_EDITING_SENTINEL, defineLine('WP_DEBUG', 'false'))
      ).to.equal("/That's all, stop editing/i define( 'WP_DEBUG', false );");
    });

    it('should insert after a matching line', () => {
      expect(insertAfterProgram('WP_DEBUG', defineLine('WP_DEBUG_LOG', 'true'))).to.equal(
        "/WP_DEBUG/a define( 'WP_DEBUG_LOG', true );"
      );
    });

    it('should only run sed when the directive exists', () => {
      const command = replaceDirectiveCommand(
        '/var/www/html/wp-config.php',
        'WP_DEBUG',
        'true'
      ).toString();

      expect(command.startsWith('grep -q ')).to.equal(true);
      expect(command).to.include(" && sed -i 's/^.*define(");
      expect(command.endsWith(" '/var/www/html/wp-config.php'")).to.equal(true);
    });
  });

  describe('generateSecrets', () => {
    it('should produce eight distinct 64-character values from the charset', () => {
      const secrets = generateSecrets();

      expect([...secrets.keys()]).to.deep.equal([...SECRET_DIRECTIVES]);
      expect(new Set(secrets.values()).size).to.equal(8);
      for (const value of secrets.values()) {
        expect(value).to.have.lengthOf(64);
        for (const char of value) {
          expect(SECRET_CHARSET).to.include(char);
        }
      }
    });

    it('should produce different values on every run', () => {
      const first = generateSecrets();
      const second = generateSecrets();

      expect(first.get('AUTH_KEY')).to.not.equal(second.get('AUTH_KEY'));
    });
  });
});
