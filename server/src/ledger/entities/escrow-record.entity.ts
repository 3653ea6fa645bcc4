import { Column, Entity, Index, PrimaryColumn } from "typeorm";
import type { EscrowState, SequentialRoute } from "@stablecoin-escrow/ledger";
import { bigintText } from "./bigint.transformer";

/**
 * One row per escrow address. A record that reached a final state is
 * overwritten in place when its (escrowId, tradeId) pair is reused.
 */
@Entity("escrow_records")
export class EscrowRecordEntity {
	@PrimaryColumn({ type: "text" })
	address!: string;

	@Column({ type: "text", transformer: bigintText })
	escrowId!: bigint;

	@Column({ type: "text", transformer: bigintText })
	tradeId!: bigint;

	@Index()
	@Column({ type: "text" })
	seller!: string;

	@Index()
	@Column({ type: "text" })
	buyer!: string;

	@Column({ type: "text" })
	arbitrator!: string;

	@Column({ type: "text", transformer: bigintText })
	amount!: bigint;

	@Column({ type: "text", transformer: bigintText })
	fee!: bigint;

	@Column({ type: "integer" })
	depositDeadline!: number;

	@Column({ type: "integer" })
	fiatDeadline!: number;

	@Column({ type: "simple-json" })
	sequential!: SequentialRoute;

	@Column({ type: "boolean", default: false })
	fiatPaid!: boolean;

	@Column({ type: "integer", default: 0 })
	counter!: number;

	@Column({ type: "text", transformer: bigintText })
	trackedBalance!: bigint;

	@Index()
	@Column({ type: "text" })
	state!: EscrowState;

	/** Encoded by `encodePhase`; bigints are stored as strings */
	@Column({ type: "text" })
	phase!: string;

	/** Ledger clock, unix seconds */
	@Index()
	@Column({ type: "integer" })
	createdAt!: number;

	@Column({ type: "integer" })
	updatedAt!: number;
}
