import { Controller, Get, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { DataSource } from "typeorm";

export type HealthStatus = {
	status: "ok" | "degraded";
	timestamp: string;
	uptime: number;
	environment: string;
	database: "up" | "down";
};

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	private readonly logger = new Logger(HealthController.name);

	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application is up; `database` reports the ledger store",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				timestamp: { type: "string", example: "2026-01-15T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
				database: { type: "string", example: "up" },
			},
		},
	})
	async healthCheck(): Promise<HealthStatus> {
		const database = await this.pingDatabase();
		return {
			status: database === "up" ? "ok" : "degraded",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
			database,
		};
	}

	private async pingDatabase(): Promise<"up" | "down"> {
		if (!this.dataSource.isInitialized) return "down";
		try {
			await this.dataSource.query("SELECT 1");
			return "up";
		} catch (e) {
			this.logger.warn(`Database ping failed: ${e instanceof Error ? e.message : String(e)}`);
			return "down";
		}
	}
}
