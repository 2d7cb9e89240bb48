import express from 'express'
import request from 'supertest'
import { createOtpIpLimiter } from '@middleware/rateLimit'
import { errorHandler } from '@middleware/errorHandler'

function buildApp(limit: number) {
  const app = express()
  app.post('/otp', createOtpIpLimiter({ limit, windowMinutes: 1 }), (req, res) => {
    res.json({ ok: true })
  })
  app.use(errorHandler)
  return app
}

describe('OTP IP rate limiter', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('lets requests through up to the limit', async () => {
    const app = buildApp(2)

    expect((await request(app).post('/otp')).status).toBe(200)
    expect((await request(app).post('/otp')).status).toBe(200)
  })

  it('answers 429 once the limit is exceeded', async () => {
    const app = buildApp(2)
    await request(app).post('/otp')
    await request(app).post('/otp')

    const res = await request(app).post('/otp')

    expect(res.status).toBe(429)
    expect(res.body).toEqual({ message: 'Too many OTP requests. Please try again later.' })
  })
})
