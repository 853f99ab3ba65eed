import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from "typeorm";
import { Ticker } from "./ticker.entity";
import { User } from "./user.entity";

@Entity({ name: "holdings" })
@Index("idx_user_ticker", ["userId", "tickerId"], { unique: true })
export class Holding {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "int" })
  userId!: number;

  @ManyToOne(() => User, (user) => user.holdings, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user?: User;

  @Column({ type: "int" })
  tickerId!: number;

  @ManyToOne(() => Ticker, { onDelete: "CASCADE" })
  @JoinColumn({ name: "tickerId" })
  ticker?: Ticker;

  @Column({ type: "int" })
  quantity!: number;

  @CreateDateColumn({ type: "timestamptz" })
  createdAt!: Date;
}
