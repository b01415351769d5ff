import { SchemaError } from "../errors.js";
import type { Bootstrap } from "../fpl/schemas.js";
import { logger } from "../log.js";
import type { Column, PlayerRow, SeasonBounds, Table } from "../types.js";

export const PLAYER_PHOTO_BASE_URL = "https://resources.premierleague.com/premierleague/photos/players/250x250/p";

export const PLAYER_COLUMNS: Column<PlayerRow>[] = [
  { name: "player_id", type: "integer" },
  { name: "first_name", type: "text" },
  { name: "second_name", type: "text" },
  { name: "web_name", type: "text" },
  { name: "team_code", type: "integer" },
  { name: "team_id", type: "integer" },
  { name: "player_position", type: "integer" },
  { name: "player_code", type: "integer" },
  { name: "region", type: "integer" },
  { name: "can_select", type: "boolean" },
  { name: "min_kickoff", type: "text" },
  { name: "max_kickoff", type: "text" },
  { name: "photo_url", type: "text" }
];

export function playerPhotoUrl(playerCode: number): string {
  return `${PLAYER_PHOTO_BASE_URL}${playerCode}.png`;
}

export function buildPlayersTable(data: Bootstrap, bounds: SeasonBounds): Table<PlayerRow> {
  if (!data.elements || data.elements.length === 0) {
    logger.error("API response is empty or malformed: no elements.");
    throw new SchemaError("API response is empty or malformed: no elements.");
  }

  const rows = data.elements.map((element): PlayerRow => ({
    player_id: element.id,
    first_name: element.first_name,
    second_name: element.second_name,
    web_name: element.web_name,
    team_code: element.team_code,
    team_id: element.team,
    player_position: element.element_type,
    player_code: element.code,
    region: element.region ?? null,
    can_select: element.can_select,
    min_kickoff: bounds.minDate,
    max_kickoff: bounds.maxDate,
    photo_url: playerPhotoUrl(element.code)
  }));

  logger.info(`Players table created with ${rows.length} records.`);
  return { columns: PLAYER_COLUMNS, rows };
}
