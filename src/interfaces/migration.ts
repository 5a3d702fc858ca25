export interface DatabaseCredentials {
  /**
   * @description The database name.
   */
  name: string;
  /**
   * @description The database user.
   */
  user: string;
  /**
   * @description The database password.
   */
  password: string;
  /**
   * @description The database host, e.g. localhost.
   */
  host: string;
}

export interface SourceDatabaseCredentials extends DatabaseCredentials {
  /**
   * @description The WordPress table prefix read from $table_prefix.
   */
  tablePrefix: string;
}

export interface MigrationParameters {
  /**
   * @description The site URL on the source server.
   */
  oldUrl: string;
  /**
   * @description The site URL after the migration.
   */
  newUrl: string;
  /**
   * @description The WordPress install directory on the source server.
   */
  sourceWpPath: string;
}

export interface ServerEndpoints<T> {
  source: T;
  destination: T;
}
