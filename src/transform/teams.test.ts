import { before, test } from "node:test";
import assert from "node:assert/strict";
import { DataError, SchemaError } from "../errors.js";
import { configureLogging } from "../log.js";
import { TEAM_COLUMNS, buildTeamsTable, teamLogoUrl } from "./teams.js";

before(() => {
  configureLogging({ sink: () => {} });
});

const bounds = { minDate: "2024-08-01T00:00:00Z", maxDate: "2024-08-10T00:00:00Z" };

test("teams are renamed, stamped with the season bounds and given a logo", () => {
  const table = buildTeamsTable(
    {
      events: [],
      teams: [
        { id: 1, code: 3, name: "Liverpool", short_name: "LIV" },
        { id: 2, code: 7, name: "Aston Villa", short_name: "AVL" }
      ]
    },
    bounds
  );

  assert.deepEqual(table.rows, [
    {
      team_id: 1,
      team_code: 3,
      team_name: "Liverpool",
      team_short_name: "LIV",
      min_kickoff: "2024-08-01T00:00:00Z",
      max_kickoff: "2024-08-10T00:00:00Z",
      logo_url: "https://upload.wikimedia.org/wikipedia/en/thumb/0/0c/Liverpool_FC.svg/180px-Liverpool_FC.svg.png"
    },
    {
      team_id: 2,
      team_code: 7,
      team_name: "Aston Villa",
      team_short_name: "AVL",
      min_kickoff: "2024-08-01T00:00:00Z",
      max_kickoff: "2024-08-10T00:00:00Z",
      logo_url: "https://resources.premierleague.com/premierleague/badges/t7.png"
    }
  ]);
});

test("every row has exactly the team column set", () => {
  const table = buildTeamsTable({ events: [], teams: [{ id: 4, code: 8, name: "Chelsea", short_name: "CHE" }] }, bounds);
  const names = table.columns.map((column) => column.name);
  assert.deepEqual(names, [
    "team_id",
    "team_code",
    "team_name",
    "team_short_name",
    "min_kickoff",
    "max_kickoff",
    "logo_url"
  ]);
  assert.deepEqual(Object.keys(table.rows[0]), names);
  assert.equal(table.columns, TEAM_COLUMNS);
});

test("the logo override follows the team name, not the code", () => {
  assert.equal(teamLogoUrl("Arsenal", 3), "https://resources.premierleague.com/premierleague/badges/t3.png");
  assert.equal(
    teamLogoUrl("Liverpool", 999),
    "https://upload.wikimedia.org/wikipedia/en/thumb/0/0c/Liverpool_FC.svg/180px-Liverpool_FC.svg.png"
  );
});

test("missing or empty teams are a SchemaError", () => {
  assert.throws(() => buildTeamsTable({ events: [] }, bounds), SchemaError);
  assert.throws(() => buildTeamsTable({ events: [], teams: [] }, bounds), SchemaError);
});

test("duplicate team ids or codes are a DataError", () => {
  assert.throws(
    () =>
      buildTeamsTable(
        {
          events: [],
          teams: [
            { id: 1, code: 3, name: "Arsenal", short_name: "ARS" },
            { id: 2, code: 3, name: "Arsenal Reserves", short_name: "ARR" }
          ]
        },
        bounds
      ),
    (error: unknown) => error instanceof DataError && error.message === "Duplicate team_code 3 in teams payload."
  );
});
