import { normalizePhoneNumber, phoneNumberSchema } from '@utils/phoneNumber'

describe('phone numbers', () => {
  it('strips everything but digits', () => {
    expect(normalizePhoneNumber('+98 (912) 345-6789')).toBe('989123456789')
    expect(normalizePhoneNumber('0912 345 6789')).toBe('09123456789')
  })

  it('parses to the normalized form', () => {
    expect(phoneNumberSchema.parse('0912-345-6789')).toBe('09123456789')
  })

  it('requires at least 10 digits', () => {
    expect(phoneNumberSchema.safeParse('912345678').success).toBe(false)
    expect(phoneNumberSchema.safeParse('9123456789').success).toBe(true)
  })

  it('limits the raw input to 15 characters', () => {
    expect(phoneNumberSchema.safeParse('0912 345 6789 00').success).toBe(false)
  })

  it('rejects input without digits', () => {
    expect(phoneNumberSchema.safeParse('not a phone').success).toBe(false)
  })
})
