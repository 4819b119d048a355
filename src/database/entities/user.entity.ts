import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { StoredRole } from '../../policy/roles';

export const USERNAME_MAX_LENGTH = 150;
export const EMAIL_MAX_LENGTH = 254;

@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: USERNAME_MAX_LENGTH, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: EMAIL_MAX_LENGTH, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 16, default: 'user' })
  role!: StoredRole;

  @Column({ name: 'first_name', type: 'varchar', length: 150, default: '' })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 150, default: '' })
  lastName!: string;

  @Column({ type: 'text', default: '' })
  bio!: string;

  @Column({ name: 'confirmation_code', type: String, length: 64, nullable: true })
  confirmationCode!: string | null;

  @Column({ name: 'confirmation_code_expires_at', type: Date, nullable: true })
  confirmationCodeExpiresAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
