import { z } from 'zod'

export const MAX_PHONE_INPUT_LENGTH = 15

export function normalizePhoneNumber(phone: string): string {
  return phone.replace(/\D/g, '')
}

export const phoneNumberSchema = z
  .string()
  .max(MAX_PHONE_INPUT_LENGTH)
  .transform(normalizePhoneNumber)
  .pipe(
    z.string().regex(/^\d{10,15}$/, 'Phone number must contain 10 to 15 digits')
  )
