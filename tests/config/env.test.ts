import { env, validateEnv } from '@config/env'

describe('validateEnv', () => {
  const originalEnv = { ...env }
  const originalProcessEnv = { ...process.env }

  afterEach(() => {
    Object.assign(env, originalEnv)
    process.env = { ...originalProcessEnv }
  })

  it('passes with the base variables for the console provider', () => {
    env.smsProvider = 'console'

    expect(() => validateEnv()).not.toThrow()
  })

  it('lists every missing variable', () => {
    delete process.env.DATABASE_URL
    delete process.env.SECRET_KEY
    env.smsProvider = 'console'

    expect(() => validateEnv()).toThrow(
      'Missing required environment variables: DATABASE_URL, SECRET_KEY'
    )
  })

  it('requires gateway credentials for kavenegar', () => {
    delete process.env.SMS_API_KEY
    delete process.env.SMS_TEMPLATE
    env.smsProvider = 'kavenegar'

    expect(() => validateEnv()).toThrow(
      'Missing required environment variables: SMS_API_KEY, SMS_TEMPLATE'
    )
  })

  it('requires twilio credentials for twilio', () => {
    process.env.TWILIO_ACCOUNT_SID = 'AC-test'
    delete process.env.TWILIO_AUTH_TOKEN
    delete process.env.TWILIO_PHONE_NUMBER
    env.smsProvider = 'twilio'

    expect(() => validateEnv()).toThrow(
      'Missing required environment variables: TWILIO_AUTH_TOKEN, TWILIO_PHONE_NUMBER'
    )
  })
})
