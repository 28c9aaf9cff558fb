import moment from "moment";
import type { PoolClient } from "pg";
import format from "pg-format";

export type DbStructure = Record<string, unknown>;

export interface SaveOptions {
	/** Stamp an `updated_at` column on every row. */
	touchUpdatedAt?: boolean;
}

const prepare = <T extends DbStructure>(
	structures: T[],
	options: SaveOptions
): DbStructure[] =>
	options.touchUpdatedAt
		? structures.map((structure) => ({ ...structure, updated_at: moment.utc().toDate() }))
		: structures;

const columnsOf = (structure: DbStructure): string[] => Object.keys(structure);

const valuesOf = (rows: DbStructure[], columns: string[]): unknown[][] =>
	rows.map((row) => columns.map((column) => row[column]));

export const saveStructures = async <T extends DbStructure>(
	structures: T[],
	tableName: string,
	client: PoolClient,
	options: SaveOptions = {}
): Promise<void> => {
	return saveStructuresWithConflictKey(structures, tableName, "(id)", client, options);
};

/** Multi-row upsert; every column but the key is overwritten on conflict. */
export const saveStructuresWithConflictKey = async <T extends DbStructure>(
	structures: T[],
	tableName: string,
	onConflictStatement: string,
	client: PoolClient,
	options: SaveOptions = {}
): Promise<void> => {
	if (structures.length === 0) {
		return;
	}

	const rows = prepare(structures, options);
	const columns = columnsOf(rows[0]);
	const columnList = columns.map((key) => `"${key}"`).join(",");
	const conflict = columns.map((key) => `"${key}" = excluded."${key}"`).join(",");

	try {
		const sql = format(
			`
        INSERT INTO ${tableName} (${columnList})
        VALUES %L
        ON CONFLICT ${onConflictStatement} DO UPDATE
        SET ${conflict}
      `,
			valuesOf(rows, columns)
		);

		await client.query(sql);
	} catch (error) {
		console.error(`[Postgres] Upsert into ${tableName} failed:`, error);
		throw new Error(`COULD_NOT_SAVE_DB_STRUCTURE: ${tableName}`);
	}
};

export const insertStructures = async <T extends DbStructure>(
	structures: T[],
	tableName: string,
	client: PoolClient
): Promise<void> => {
	if (structures.length === 0) {
		return;
	}

	const columns = columnsOf(structures[0]);
	const columnList = columns.map((key) => `"${key}"`).join(",");

	const sql = format(
		`INSERT INTO ${tableName} (${columnList}) VALUES %L`,
		valuesOf(structures, columns)
	);
	await client.query(sql);
};

export type Grouping<T> = Map<string, T[]>;

export const makeGrouping = <T>(rows: T[], keyOf: (row: T) => string | null): Grouping<T> => {
	const grouping: Grouping<T> = new Map();

	for (const row of rows) {
		const key = keyOf(row);
		if (!key) continue;

		const group = grouping.get(key);
		if (group) {
			group.push(row);
		} else {
			grouping.set(key, [row]);
		}
	}

	return grouping;
};
