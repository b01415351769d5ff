import { DataError, SchemaError, describeError } from "../errors.js";
import type { Bootstrap } from "../fpl/schemas.js";
import { logger } from "../log.js";
import type { Column, SeasonBounds, Table, TeamRow } from "../types.js";

export const TEAM_BADGE_BASE_URL = "https://resources.premierleague.com/premierleague/badges/t";

// The badge CDN serves an outdated crest for this one club.
const LOGO_OVERRIDES: Record<string, string> = {
  Liverpool: "https://upload.wikimedia.org/wikipedia/en/thumb/0/0c/Liverpool_FC.svg/180px-Liverpool_FC.svg.png"
};

export const TEAM_COLUMNS: Column<TeamRow>[] = [
  { name: "team_id", type: "integer" },
  { name: "team_code", type: "integer" },
  { name: "team_name", type: "text" },
  { name: "team_short_name", type: "text" },
  { name: "min_kickoff", type: "text" },
  { name: "max_kickoff", type: "text" },
  { name: "logo_url", type: "text" }
];

export function teamLogoUrl(teamName: string, teamCode: number): string {
  return LOGO_OVERRIDES[teamName] ?? `${TEAM_BADGE_BASE_URL}${teamCode}.png`;
}

function assertUnique(rows: TeamRow[], key: "team_id" | "team_code"): void {
  const seen = new Set<number>();
  for (const row of rows) {
    if (seen.has(row[key])) {
      throw new DataError(`Duplicate ${key} ${row[key]} in teams payload.`);
    }
    seen.add(row[key]);
  }
}

export function buildTeamsTable(data: Bootstrap, bounds: SeasonBounds): Table<TeamRow> {
  if (!data.teams || data.teams.length === 0) {
    logger.error("API response is empty or malformed: no teams.");
    throw new SchemaError("API response is empty or malformed: no teams.");
  }

  const rows = data.teams.map((team): TeamRow => ({
    team_id: team.id,
    team_code: team.code,
    team_name: team.name,
    team_short_name: team.short_name,
    min_kickoff: bounds.minDate,
    max_kickoff: bounds.maxDate,
    logo_url: teamLogoUrl(team.name, team.code)
  }));

  try {
    assertUnique(rows, "team_id");
    assertUnique(rows, "team_code");
  } catch (error) {
    logger.error(`Error converting teams to a table: ${describeError(error)}`);
    throw error;
  }

  logger.info(`Teams table created with ${rows.length} records.`);
  return { columns: TEAM_COLUMNS, rows };
}
