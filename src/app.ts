import 'reflect-metadata'
import express from 'express'
import cors from 'cors'
import { env } from '@config/env'
import { authMiddleware } from '@middleware/auth'
import { errorHandler } from '@middleware/errorHandler'
import routes from '@routes/index'

const app = express()

// Middleware
app.use(cors(env.corsAllowedOrigins.length > 0
  ? { origin: env.corsAllowedOrigins, credentials: true }
  : undefined))
app.use(express.json({ limit: '100kb' }))

// Auth middleware with whitelist
const publicPaths = [
  '/api/accounts/request-otp',
  '/api/accounts/verify-otp',
  '/api/accounts/refresh-token',
  '/api/health',
]
app.use(authMiddleware(publicPaths))

// Routes
app.use(routes)

// Error handler (must be last)
app.use(errorHandler)

export default app
