import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { NAME_MAX_LENGTH, SLUG_MAX_LENGTH } from './category.entity';

@Entity('genres')
export class Genre {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: NAME_MAX_LENGTH, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: SLUG_MAX_LENGTH, unique: true })
  slug!: string;
}
