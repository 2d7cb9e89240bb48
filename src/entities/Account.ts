import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm'

@Entity('accounts')
@Index('idx_accounts_created_at', ['createdAt'])
export class Account {
  @PrimaryGeneratedColumn('increment')
  id!: number

  @Column({ type: 'varchar', length: 15, unique: true })
  phoneNumber!: string

  @Column({ type: 'text', nullable: true })
  name!: string | null

  @Column({ type: 'varchar', length: 10, nullable: true })
  nationalId!: string | null

  @Column({ type: Boolean, default: false })
  isPhoneVerified!: boolean

  @CreateDateColumn()
  createdAt!: Date

  @UpdateDateColumn()
  updatedAt!: Date
}
