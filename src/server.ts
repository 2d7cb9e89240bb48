import 'reflect-metadata'
import { env, validateEnv } from '@config/env'
import { AppDataSource } from '@config/database'
import app from './app'

async function start() {
  try {
    validateEnv()

    // Initialize database connection
    await AppDataSource.initialize()
    console.log('Database connected')

    // Run migrations
    await AppDataSource.runMigrations()
    console.log('Migrations complete')

    app.listen(env.port, () => {
      console.log(`Server running on port ${env.port}`)
    })
  } catch (error) {
    console.error('Failed to start server:', error)
    process.exit(1)
  }
}

void start()
