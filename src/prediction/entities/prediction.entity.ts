import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('predictions')
@Index('idx_predictions_user_created', ['userId', 'createdAt'])
export class Prediction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Column({ name: 'mobile_no', length: 15 })
  mobileNo!: string;

  @Column('double precision')
  score!: number;

  @Column({ length: 20 })
  category!: string;

  /**
   * Recommended jewelry names, best first.
   */
  @Column('jsonb', { default: () => "'[]'" })
  recommendations!: string[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
