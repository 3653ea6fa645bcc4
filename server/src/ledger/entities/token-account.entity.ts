import { Column, Entity, Index, PrimaryColumn } from "typeorm";
import type { AccountKind } from "@stablecoin-escrow/ledger";
import { bigintText } from "./bigint.transformer";

@Entity("token_accounts")
export class TokenAccountEntity {
	@PrimaryColumn({ type: "text" })
	address!: string;

	@Column({ type: "text" })
	owner!: string;

	@Index()
	@Column({ type: "text" })
	kind!: AccountKind;

	/** Escrow record a vault belongs to; null for wallets */
	@Index()
	@Column({ type: "text", nullable: true })
	escrow!: string | null;

	@Column({ type: "text", transformer: bigintText })
	balance!: bigint;
}
