import 'reflect-metadata'
import { DataSource } from 'typeorm'
import { SnakeNamingStrategy } from 'typeorm-naming-strategies'
import { Account } from '@entities/Account'
import { OtpCode } from '@entities/OtpCode'

// In-memory stand-in for the PostgreSQL data source; swapped in with
// jest.mock('@config/database', ...)
export const AppDataSource = new DataSource({
  type: 'better-sqlite3',
  database: ':memory:',
  synchronize: true,
  namingStrategy: new SnakeNamingStrategy(),
  entities: [Account, OtpCode],
})

/** Formats a date the way SQLite stores datetime columns (UTC). */
export function toSqliteDatetime(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '')
}
