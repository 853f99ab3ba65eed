import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from "typeorm";
import type { IngestionSource, IngestionTrigger, SymbolIngestionResult } from "@portfolio-valuation/shared";

@Entity({ name: "ingestion_runs" })
export class IngestionRun {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  runId!: string;

  @Column({ type: "varchar" })
  trigger!: IngestionTrigger;

  @Column({ type: "varchar" })
  mode!: IngestionSource;

  @Column({ type: "int" })
  symbolCount!: number;

  @Column({ type: "int" })
  successCount!: number;

  @Column({ type: "int" })
  errorCount!: number;

  @Column({ type: "int" })
  insertedCount!: number;

  @Column({ type: "jsonb" })
  results!: SymbolIngestionResult[];

  @Column({ type: "int" })
  durationMs!: number;

  @CreateDateColumn({ type: "timestamptz" })
  createdAt!: Date;
}
