export type ColumnType = "integer" | "real" | "text" | "boolean" | "timestamp";

export type CellValue = string | number | boolean | Date | null;

export type TableRow = Record<string, CellValue>;

export interface Column<Row extends TableRow = TableRow> {
  name: Extract<keyof Row, string>;
  type: ColumnType;
}

export interface Table<Row extends TableRow = TableRow> {
  columns: Column<Row>[];
  rows: Row[];
}

export interface TableTarget {
  schema?: string;
  table: string;
}

export interface SeasonBounds {
  minDate: string;
  maxDate: string;
}

export type TeamRow = {
  team_id: number;
  team_code: number;
  team_name: string;
  team_short_name: string;
  min_kickoff: string;
  max_kickoff: string;
  logo_url: string;
};

export type PlayerRow = {
  player_id: number;
  first_name: string;
  second_name: string;
  web_name: string;
  team_code: number;
  team_id: number;
  player_position: number;
  player_code: number;
  region: number | null;
  can_select: boolean;
  min_kickoff: string;
  max_kickoff: string;
  photo_url: string;
};

export type GameRow = {
  game_code: number;
  game_week_id: number;
  finished: boolean;
  game_id: number;
  kickoff_time: Date | null;
  team_id_a: number;
  team_id_h: number;
  team_a_score: number;
  team_h_score: number;
  difficulty_a: number;
  difficulty_h: number;
};

export type TeamSide = "a" | "h";

export type StatEventRow = {
  game_code: number;
  finished: boolean | null;
  game_id: number;
  stat_value: number;
  player_id: number;
  team_type: TeamSide;
  stat_type: string;
};
