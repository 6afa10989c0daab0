import { ConnectionConfig, DbType } from '../types/index.js';
import { IDbConnection, IDDLGenerator, IMetadataCatalog } from './interfaces.js';
import { MysqlCatalog } from './mysql/MysqlCatalog.js';
import { MysqlConnection } from './mysql/MysqlConnection.js';
import { MysqlDDLGenerator } from './mysql/MysqlDDLGenerator.js';

// MariaDB speaks the MySQL protocol and shares its catalog and DDL, so both map to the same engine.
export class EngineFactory {
  static createConnection(type: DbType, config: ConnectionConfig): IDbConnection {
    switch (type) {
      case 'mysql':
      case 'mariadb':
        return new MysqlConnection(config);
      default:
        throw new Error(`Unsupported database type: ${String(type)}`);
    }
  }

  static createCatalog(type: DbType, connection: IDbConnection): IMetadataCatalog {
    switch (type) {
      case 'mysql':
      case 'mariadb':
        return new MysqlCatalog(connection);
      default:
        throw new Error(`Unsupported database type: ${String(type)}`);
    }
  }

  static createGenerator(type: DbType): IDDLGenerator {
    switch (type) {
      case 'mysql':
      case 'mariadb':
        return new MysqlDDLGenerator(type);
      default:
        throw new Error(`Unsupported database type: ${String(type)}`);
    }
  }
}
