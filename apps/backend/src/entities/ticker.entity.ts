import { Column, Entity, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";
import { PricePoint } from "./price-point.entity";

@Entity({ name: "tickers" })
export class Ticker {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ unique: true })
  symbol!: string;

  @Column()
  name!: string;

  @Column({ type: "text", nullable: true })
  sector?: string | null;

  @UpdateDateColumn({ type: "timestamptz" })
  updatedAt!: Date;

  @OneToMany(() => PricePoint, (price) => price.ticker)
  prices?: PricePoint[];
}
