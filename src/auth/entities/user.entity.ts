import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * Registered account. Both `username` and `mobileNo` identify the user at login.
 */
@Entity('users')
@Index('idx_users_username', ['username'], { unique: true })
@Index('idx_users_mobile_no', ['mobileNo'], { unique: true })
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 50 })
  username!: string;

  /**
   * Digits with an optional leading `+`, stored as entered.
   */
  @Column({ name: 'mobile_no', length: 15 })
  mobileNo!: string;

  @Column({ name: 'password_hash' })
  passwordHash!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @Column({ name: 'last_login_at', type: 'timestamp', nullable: true })
  lastLoginAt!: Date | null;
}
