import dotenv from 'dotenv'
dotenv.config()

export type SmsProvider = 'kavenegar' | 'twilio' | 'console'

const smsProviders: readonly SmsProvider[] = ['kavenegar', 'twilio', 'console']

function parseSmsProvider(value: string | undefined): SmsProvider {
  const provider = smsProviders.find(p => p === value)
  return provider ?? 'kavenegar'
}

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
}

export const env = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  databaseUrl: process.env.DATABASE_URL || '',
  secretKey: process.env.SECRET_KEY || '',
  corsAllowedOrigins: parseList(process.env.CORS_ALLOWED_ORIGINS),

  // JWT lifetimes in seconds (1 hour / 7 days)
  accessTokenLifetime: parseInt(process.env.ACCESS_TOKEN_LIFETIME || '3600', 10),
  refreshTokenLifetime: parseInt(process.env.REFRESH_TOKEN_LIFETIME || '604800', 10),

  // OTP
  otpCodeLength: parseInt(process.env.OTP_CODE_LENGTH || '6', 10),
  otpExpiryMinutes: parseInt(process.env.OTP_EXPIRY_MINUTES || '5', 10),
  otpRateLimitCount: parseInt(process.env.OTP_RATE_LIMIT_COUNT || '3', 10),
  otpRateLimitMinutes: parseInt(process.env.OTP_RATE_LIMIT_MINUTES || '10', 10),
  otpIpRateLimitCount: parseInt(process.env.OTP_IP_RATE_LIMIT_COUNT || '20', 10),
  otpHashRounds: parseInt(process.env.OTP_HASH_ROUNDS || '10', 10),

  // SMS
  smsProvider: parseSmsProvider(process.env.SMS_PROVIDER),
  smsApiKey: process.env.SMS_API_KEY || '',
  smsTemplate: process.env.SMS_TEMPLATE || '',
  smsApiUrl: process.env.SMS_API_URL || 'https://api.kavenegar.com/v1',

  // Twilio
  twilioAccountSid: process.env.TWILIO_ACCOUNT_SID || '',
  twilioAuthToken: process.env.TWILIO_AUTH_TOKEN || '',
  twilioPhoneNumber: process.env.TWILIO_PHONE_NUMBER || '',
}

export function validateEnv() {
  const required = [
    'DATABASE_URL',
    'SECRET_KEY',
  ]

  if (env.smsProvider === 'kavenegar') {
    required.push('SMS_API_KEY', 'SMS_TEMPLATE')
  } else if (env.smsProvider === 'twilio') {
    required.push('TWILIO_ACCOUNT_SID', 'TWILIO_AUTH_TOKEN', 'TWILIO_PHONE_NUMBER')
  }

  const missing = required.filter(key => !process.env[key])

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`)
  }
}
