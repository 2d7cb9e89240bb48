import { Router } from 'express'
import accountRoutes from './accounts'

const router = Router()

// API routes
router.use('/api/accounts', accountRoutes)

// Health check
router.get('/api/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() })
})

export default router
