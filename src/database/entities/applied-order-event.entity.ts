import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/** Dedup record: an OrderPlaced event whose stock adjustment was applied. */
@Entity('applied_order_events')
@Index(['appliedAt'])
export class AppliedOrderEventEntity {
  @PrimaryColumn({ name: 'order_id', type: 'varchar', length: 36 })
  orderId!: string;

  @Column({ name: 'item_id', type: 'int' })
  itemId!: number;

  @Column({ type: 'int' })
  quantity!: number;

  @Column({ name: 'applied_at', type: 'datetime' })
  appliedAt!: Date;
}
