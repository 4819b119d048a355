import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

export const NAME_MAX_LENGTH = 256;
export const SLUG_MAX_LENGTH = 50;

@Entity('categories')
export class Category {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: NAME_MAX_LENGTH, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: SLUG_MAX_LENGTH, unique: true })
  slug!: string;
}
