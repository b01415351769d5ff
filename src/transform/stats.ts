import { DataError } from "../errors.js";
import type { Fixture } from "../fpl/schemas.js";
import { logger } from "../log.js";
import type { Column, StatEventRow, Table, TeamSide } from "../types.js";

export const STAT_CATALOGUE = [
  "goals_scored",
  "own_goals",
  "yellow_cards",
  "red_cards",
  "assists",
  "penalties_saved",
  "penalties_missed",
  "saves",
  "bonus",
  "bps"
] as const;

export type StatName = (typeof STAT_CATALOGUE)[number];

const SIDES: TeamSide[] = ["a", "h"];

export const STAT_EVENT_COLUMNS: Column<StatEventRow>[] = [
  { name: "game_code", type: "integer" },
  { name: "finished", type: "boolean" },
  { name: "game_id", type: "integer" },
  { name: "stat_value", type: "real" },
  { name: "player_id", type: "integer" },
  { name: "team_type", type: "text" },
  { name: "stat_type", type: "text" }
];

export function isStatName(value: string): value is StatName {
  return STAT_CATALOGUE.some((name) => name === value);
}

export function extractStat(fixtures: Fixture[], statName: StatName): StatEventRow[] {
  const rows: StatEventRow[] = [];
  for (const fixture of fixtures) {
    for (const stat of fixture.stats) {
      if (stat.identifier !== statName) continue;
      for (const side of SIDES) {
        for (const entry of stat[side]) {
          rows.push({
            game_code: fixture.code,
            finished: fixture.finished ?? null,
            game_id: fixture.id,
            stat_value: entry.value,
            player_id: entry.element,
            team_type: side,
            stat_type: statName
          });
        }
      }
    }
  }
  return rows;
}

/**
 * Flattens the per-fixture stat blocks into one long table, one row per
 * player entry. Rows are grouped by catalogue order. An empty result is
 * returned as an empty table; callers decide whether that is worth loading.
 */
export function aggregateStats(fixtures: Fixture[], catalogue: readonly StatName[]): Table<StatEventRow> {
  if (fixtures.length === 0) {
    logger.error("No data available for processing.");
    throw new DataError("No data available for processing.");
  }

  const rows = catalogue.flatMap((statName) => extractStat(fixtures, statName));
  logger.info(`Stats processing completed with ${rows.length} records.`);
  return { columns: STAT_EVENT_COLUMNS, rows };
}
