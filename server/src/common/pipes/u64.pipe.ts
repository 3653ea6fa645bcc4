import { BadRequestException, Injectable, type PipeTransform } from "@nestjs/common";

/**
 * Accepts a decimal u64 and passes it on as a string; handlers convert it to
 * bigint themselves, since route parameter metadata cannot carry bigint.
 */
@Injectable()
export class ParseU64StringPipe implements PipeTransform<string, string> {
	transform(value: string): string {
		if (!/^\d{1,20}$/.test(value)) {
			throw new BadRequestException(`Invalid u64 ${value}`);
		}
		return value;
	}
}
