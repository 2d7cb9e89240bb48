import 'reflect-metadata'
import path from 'path'
import { DataSource } from 'typeorm'
import { SnakeNamingStrategy } from 'typeorm-naming-strategies'
import { env } from '@config/env'
import { Account } from '@entities/Account'
import { OtpCode } from '@entities/OtpCode'

// Enable SSL for remote databases (Heroku, AWS RDS, etc.)
const isRemoteDb = env.databaseUrl.includes('amazonaws.com') ||
                   env.databaseUrl.includes('heroku') ||
                   env.nodeEnv === 'production'

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: env.databaseUrl,
  ssl: isRemoteDb ? { rejectUnauthorized: false } : false,
  synchronize: false,
  logging: env.nodeEnv === 'development',
  namingStrategy: new SnakeNamingStrategy(),
  entities: [Account, OtpCode],
  migrations: [path.join(__dirname, '../migrations/*.{ts,js}')],
})
