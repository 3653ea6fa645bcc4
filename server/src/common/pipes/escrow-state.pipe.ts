import { BadRequestException, Injectable, type PipeTransform } from "@nestjs/common";
import type { EscrowState } from "@stablecoin-escrow/ledger";
import { ESCROW_STATES } from "../../escrows/dto/get-escrow.dto";

function isEscrowState(value: string): value is EscrowState {
	return ESCROW_STATES.some((state) => state === value);
}

@Injectable()
export class ParseEscrowStatePipe
	implements PipeTransform<string | undefined, EscrowState | undefined>
{
	transform(value: string | undefined): EscrowState | undefined {
		if (!value) {
			return undefined;
		}
		if (!isEscrowState(value)) {
			throw new BadRequestException(`Invalid state ${value}`);
		}
		return value;
	}
}
