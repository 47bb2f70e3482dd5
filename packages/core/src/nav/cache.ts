import type { ColumnDescriptor, DatabaseRef, SchemaRef, TableRef } from '../db/types.js';

/**
 * Catalog children fetched during one session, keyed by their parent.
 * Entries are replaced whole on refresh and dropped when the session ends.
 */
export class CatalogCache {
  private databases: DatabaseRef[] | null = null;
  private readonly schemas = new Map<string, SchemaRef[]>();
  private readonly tables = new Map<string, TableRef[]>();
  private readonly columns = new Map<string, ColumnDescriptor[]>();

  getDatabases(): DatabaseRef[] | null {
    return this.databases;
  }

  setDatabases(databases: DatabaseRef[]): void {
    this.databases = [...databases];
  }

  getSchemas(database: DatabaseRef): SchemaRef[] | undefined {
    return this.schemas.get(database.name);
  }

  setSchemas(database: DatabaseRef, schemas: SchemaRef[]): void {
    this.schemas.set(database.name, [...schemas]);
  }

  getTables(schema: SchemaRef): TableRef[] | undefined {
    return this.tables.get(schemaKey(schema));
  }

  setTables(schema: SchemaRef, tables: TableRef[]): void {
    this.tables.set(schemaKey(schema), [...tables]);
  }

  getColumns(table: TableRef): ColumnDescriptor[] | undefined {
    return this.columns.get(tableKey(table));
  }

  setColumns(table: TableRef, columns: ColumnDescriptor[]): void {
    this.columns.set(tableKey(table), [...columns]);
  }

  clear(): void {
    this.databases = null;
    this.schemas.clear();
    this.tables.clear();
    this.columns.clear();
  }
}

function schemaKey(schema: SchemaRef): string {
  return JSON.stringify([schema.database, schema.name]);
}

function tableKey(table: TableRef): string {
  return JSON.stringify([table.database, table.schema, table.name]);
}
