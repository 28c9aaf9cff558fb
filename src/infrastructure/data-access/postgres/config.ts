import { Pool } from "pg";
import { databaseConfig } from "@/infrastructure/config/config";

export const pool = new Pool({
	connectionString: databaseConfig.connectionString,
	max: databaseConfig.maxConnections,
});

pool.on("error", (error) => {
	console.error("[Postgres] Idle client error:", error);
});
