import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from "typeorm";
import { Ticker } from "./ticker.entity";

@Entity({ name: "prices" })
@Index("idx_ticker_date", ["tickerId", "date"], { unique: true })
export class PricePoint {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "int" })
  tickerId!: number;

  @ManyToOne(() => Ticker, (ticker) => ticker.prices, { onDelete: "CASCADE" })
  @JoinColumn({ name: "tickerId" })
  ticker?: Ticker;

  // Calendar day, YYYY-MM-DD.
  @Column({ type: "date" })
  date!: string;

  @Column({ type: "float" })
  open!: number;

  @Column({ type: "float" })
  high!: number;

  @Column({ type: "float" })
  low!: number;

  @Column({ type: "float" })
  close!: number;

  @Column({ type: "float" })
  volume!: number;
}
