import { ColumnType } from 'typeorm';

// Postgres en producción; better-sqlite3 en pruebas.
const isSqlite = (process.env.DB_DRIVER ?? 'postgres') === 'better-sqlite3';

/** Tipo de columna fecha-hora aceptado por el driver activo. */
export const TIMESTAMP_COLUMN: ColumnType = isSqlite ? 'datetime' : 'timestamptz';
