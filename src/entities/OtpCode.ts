import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm'

export const OTP_PURPOSES = ['register', 'login'] as const

export type OtpPurpose = typeof OTP_PURPOSES[number]

@Entity('otp_codes')
@Index('idx_otp_codes_phone_created', ['phoneNumber', 'createdAt'])
@Index('idx_otp_codes_phone_purpose_consumed', ['phoneNumber', 'purpose', 'consumed'])
export class OtpCode {
  @PrimaryGeneratedColumn('increment')
  id!: number

  @Column({ type: 'varchar', length: 15 })
  phoneNumber!: string

  @Column({ type: 'varchar', length: 255 })
  codeHash!: string

  @Column({ type: 'varchar', length: 10 })
  purpose!: OtpPurpose

  @Column({ type: Date })
  expiresAt!: Date

  @Column({ type: Boolean, default: false })
  consumed!: boolean

  @Column({ type: Date, nullable: true })
  consumedAt!: Date | null

  @CreateDateColumn()
  createdAt!: Date

  isExpired(now: Date = new Date()): boolean {
    return now.getTime() > this.expiresAt.getTime()
  }
}
