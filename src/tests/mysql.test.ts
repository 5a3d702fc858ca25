import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  createDatabaseSql,
  mysqlClient,
  mysqlImport,
  mysqlRoot,
  mysqldump,
  sqlIdentifier,
  updateSiteUrlSql,
} from '../lib/mysql';
import { ValidationError } from '../lib/sanitization';

const credentials = {
  name: 'wp_db',
  user: 'wp_user',
  password: 'test-secret',
  host: 'localhost',
};

describe('mysql commands', () => {
  it('should pass the password through MYSQL_PWD', () => {
    expect(mysqlClient(credentials, 'SELECT 1;').toString()).to.equal(
      "MYSQL_PWD=test-secret mysql -h localhost -u wp_user wp_db -e 'SELECT 1;'"
    );
  });

  it('should dump with a consistent snapshot', () => {
    expect(mysqldump(credentials, '/tmp/dump.sql').toString()).to.equal(
      "MYSQL_PWD=test-secret mysqldump --single-transaction -h localhost -u wp_user wp_db > '/tmp/dump.sql'"
    );
  });

  it('should import from a file', () => {
    expect(mysqlImport(credentials, '/tmp/dump.sql').toString()).to.equal(
      "MYSQL_PWD=test-secret mysql -h localhost -u wp_user wp_db < '/tmp/dump.sql'"
    );
  });

  it('should connect as root with or without a password', () => {
    expect(mysqlRoot('FLUSH PRIVILEGES;').toString()).to.equal(
      "mysql -u root -e 'FLUSH PRIVILEGES;'"
    );
    expect(mysqlRoot('FLUSH PRIVILEGES;', "it's").toString()).to.equal(
      "MYSQL_PWD='it'\\''s' mysql -u root -e 'FLUSH PRIVILEGES;'"
    );
  });

  it('should create the database, the user and the grants', () => {
    const sql = createDatabaseSql({
      name: 'new_db',
      user: 'new_user',
      password: "pa'ss",
      host: 'localhost',
    });

    expect(sql).to.equal(
      "CREATE DATABASE IF NOT EXISTS `new_db`; " +
        "CREATE USER IF NOT EXISTS 'new_user'@'localhost' IDENTIFIED BY 'pa\\'ss'; " +
        "GRANT ALL PRIVILEGES ON `new_db`.* TO 'new_user'@'localhost'; " +
        'FLUSH PRIVILEGES;'
    );
  });

  it('should update siteurl and home in the prefixed options table', () => {
    expect(updateSiteUrlSql('wp_', 'https://new.example')).to.equal(
      "UPDATE `wp_options` SET option_value = 'https://new.example' WHERE option_name = 'siteurl'; " +
        "UPDATE `wp_options` SET option_value = 'https://new.example' WHERE option_name = 'home';"
    );
  });

  it('should reject identifiers that are not plain names', () => {
    expect(() => sqlIdentifier('wp;drop', 'Options table')).to.throw(ValidationError);
    expect(sqlIdentifier('site_posts')).to.equal('`site_posts`');
  });
});
