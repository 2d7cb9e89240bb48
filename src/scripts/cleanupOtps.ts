import 'reflect-metadata'
import { validateEnv } from '@config/env'
import { AppDataSource } from '@config/database'
import { cleanupExpiredOtps } from '@services/otpService'

// Deletes expired OTP records. Meant for a periodic job (cron, scheduler).
async function run() {
  try {
    validateEnv()
    await AppDataSource.initialize()

    const removed = await cleanupExpiredOtps()
    console.log(`[OTP] Removed ${removed} expired code(s)`)

    await AppDataSource.destroy()
    process.exit(0)
  } catch (error) {
    console.error('[OTP] Cleanup failed:', error)
    process.exit(1)
  }
}

if (require.main === module) {
  void run()
}
