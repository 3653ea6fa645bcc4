import type { Type } from "@nestjs/common";
import { ApiProperty, getSchemaPath } from "@nestjs/swagger";

export type ApiEnvelope<T> = { data: T };

export type PageMeta = {
	total: number;
	limit: number;
	offset: number;
	hasMore: boolean;
};

export type ApiPaginatedEnvelope<T> = { data: T; meta: PageMeta };

export class PageMetaDto implements PageMeta {
	@ApiProperty({ description: "Items matching the query before paging" })
	total!: number;

	@ApiProperty({ example: 20 })
	limit!: number;

	@ApiProperty({ example: 0 })
	offset!: number;

	@ApiProperty()
	hasMore!: boolean;
}

export class ApiEnvelopeShellDto<T = unknown> {
	@ApiProperty()
	data!: T;
}

export class ApiPaginatedEnvelopeShellDto<T = unknown> {
	@ApiProperty({ isArray: true })
	data!: T[];

	@ApiProperty({ type: PageMetaDto })
	meta!: PageMetaDto;
}

export function envelope<T>(data: T): ApiEnvelope<T> {
	return { data };
}

export function paginatedEnvelope<T>(
	items: T[],
	meta: PageMeta,
): ApiPaginatedEnvelope<T[]> {
	return { data: items, meta };
}

export function getSchemaPathForDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{ properties: { data: { $ref: getSchemaPath(dto) } } },
		],
	};
}

export function getSchemaPathForPaginatedDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiPaginatedEnvelopeShellDto) },
			{
				properties: {
					data: { type: "array", items: { $ref: getSchemaPath(dto) } },
				},
			},
		],
	};
}
