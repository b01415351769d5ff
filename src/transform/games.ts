import { SchemaError } from "../errors.js";
import type { Fixture } from "../fpl/schemas.js";
import { logger } from "../log.js";
import type { Column, GameRow, Table } from "../types.js";

export const GAME_COLUMNS: Column<GameRow>[] = [
  { name: "game_code", type: "integer" },
  { name: "game_week_id", type: "integer" },
  { name: "finished", type: "boolean" },
  { name: "game_id", type: "integer" },
  { name: "kickoff_time", type: "timestamp" },
  { name: "team_id_a", type: "integer" },
  { name: "team_id_h", type: "integer" },
  { name: "team_a_score", type: "integer" },
  { name: "team_h_score", type: "integer" },
  { name: "difficulty_a", type: "integer" },
  { name: "difficulty_h", type: "integer" }
];

export function toGameRow(fixture: Fixture): GameRow {
  return {
    game_code: fixture.code,
    game_week_id: fixture.event ?? 0,
    finished: fixture.finished ?? false,
    game_id: fixture.id,
    kickoff_time: fixture.kickoff_time ? new Date(fixture.kickoff_time) : null,
    team_id_a: fixture.team_a,
    team_id_h: fixture.team_h,
    team_a_score: fixture.team_a_score ?? 0,
    team_h_score: fixture.team_h_score ?? 0,
    difficulty_a: fixture.team_a_difficulty ?? 0,
    difficulty_h: fixture.team_h_difficulty ?? 0
  };
}

export function buildGamesTable(fixtures: Fixture[]): Table<GameRow> {
  if (fixtures.length === 0) {
    logger.error("API response is empty: no fixtures.");
    throw new SchemaError("API response is empty: no fixtures.");
  }

  const rows = fixtures.map(toGameRow);
  logger.info(`Games table created with ${rows.length} records.`);
  return { columns: GAME_COLUMNS, rows };
}
