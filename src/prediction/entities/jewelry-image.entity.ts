import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('jewelry_images')
@Index('idx_jewelry_images_name', ['name'], { unique: true })
export class JewelryImage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 255 })
  name!: string;

  @Column('text')
  url!: string;
}
