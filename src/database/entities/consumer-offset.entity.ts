import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

@Entity('consumer_offsets')
export class ConsumerOffsetEntity {
  @PrimaryColumn({ name: 'group_id', type: 'varchar', length: 255 })
  groupId!: string;

  @PrimaryColumn({ type: 'varchar', length: 255 })
  topic!: string;

  @PrimaryColumn({ type: 'int' })
  partition!: number;

  /** Next offset to fetch. */
  @Column({ type: 'varchar', length: 32 })
  offset!: string;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
