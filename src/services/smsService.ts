import axios from 'axios'
import twilio from 'twilio'
import { env } from '@config/env'
import { SmsDeliveryError } from '@utils/ResponseError'

interface KavenegarResponse {
  return: {
    status: number
    message: string
  }
  entries?: unknown[]
}

type TwilioClient = ReturnType<typeof twilio>

let twilioClient: TwilioClient | null = null

function getTwilioClient(): TwilioClient {
  if (!twilioClient) {
    twilioClient = twilio(env.twilioAccountSid, env.twilioAuthToken)
  }
  return twilioClient
}

function describeError(error: unknown): string {
  if (axios.isAxiosError<KavenegarResponse>(error)) {
    const body = error.response?.data
    if (body?.return) {
      return `status ${body.return.status}: ${body.return.message}`
    }
    return error.response ? `HTTP ${error.response.status}` : error.message
  }
  return error instanceof Error ? error.message : String(error)
}

async function sendViaKavenegar(phoneNumber: string, code: string): Promise<void> {
  if (!env.smsApiKey || !env.smsTemplate) {
    throw new Error('SMS_API_KEY and SMS_TEMPLATE must be configured')
  }

  const url = `${env.smsApiUrl}/${env.smsApiKey}/verify/lookup.json`
  const response = await axios.post<KavenegarResponse>(
    url,
    new URLSearchParams({
      template: env.smsTemplate,
      receptor: phoneNumber,
      token: code,
    }),
    { timeout: 10000 }
  )

  const result = response.data?.return
  if (result?.status !== 200) {
    throw new Error(`Kavenegar rejected the message: ${result?.message ?? 'unknown error'}`)
  }
}

async function sendViaTwilio(phoneNumber: string, code: string): Promise<void> {
  await getTwilioClient().messages.create({
    body: `Your verification code is: ${code}`,
    from: env.twilioPhoneNumber,
    to: `+${phoneNumber}`,
  })
}

export async function sendOtpSms(phoneNumber: string, code: string): Promise<void> {
  if (env.smsProvider === 'console') {
    console.log(`[DEV] Verification code for ${phoneNumber}: ${code}`)
    return
  }

  try {
    if (env.smsProvider === 'twilio') {
      await sendViaTwilio(phoneNumber, code)
    } else {
      await sendViaKavenegar(phoneNumber, code)
    }
    console.log(`[SMS] Sent verification code to ${phoneNumber} via ${env.smsProvider}`)
  } catch (error) {
    console.error(`[SMS] ${env.smsProvider} delivery to ${phoneNumber} failed: ${describeError(error)}`)
    throw new SmsDeliveryError()
  }
}
