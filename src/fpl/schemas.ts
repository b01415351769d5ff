import { z } from "zod";
import { SchemaError } from "../errors.js";

const timestamp = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
  message: "Expected an ISO timestamp"
});

const int = z.number().int();

const eventSchema = z.object({
  deadline_time: timestamp.nullish()
});

const teamSchema = z.object({
  id: int,
  code: int,
  name: z.string(),
  short_name: z.string()
});

const elementSchema = z.object({
  id: int,
  first_name: z.string(),
  second_name: z.string(),
  web_name: z.string(),
  team_code: int,
  team: int,
  element_type: int,
  code: int,
  region: int.nullish(),
  can_select: z.boolean()
});

// `teams` and `elements` stay optional here; the transformer that needs one enforces it.
// Missing events surface as the missing-deadline DataError from deriveSeasonBounds.
const bootstrapSchema = z.object({
  events: z.array(eventSchema).default([]),
  teams: z.array(teamSchema).optional(),
  elements: z.array(elementSchema).optional()
});

const statEntrySchema = z.object({
  element: int,
  value: z.number()
});

const fixtureStatSchema = z.object({
  identifier: z.string(),
  a: z.array(statEntrySchema).default([]),
  h: z.array(statEntrySchema).default([])
});

const fixtureSchema = z.object({
  code: int,
  event: int.nullish(),
  finished: z.boolean().nullish(),
  id: int,
  kickoff_time: timestamp.nullish(),
  team_a: int,
  team_h: int,
  team_a_score: int.nullish(),
  team_h_score: int.nullish(),
  team_a_difficulty: int.nullish(),
  team_h_difficulty: int.nullish(),
  stats: z.array(fixtureStatSchema).default([])
});

const fixturesSchema = z.array(fixtureSchema);

export type BootstrapEvent = z.infer<typeof eventSchema>;
export type BootstrapTeam = z.infer<typeof teamSchema>;
export type BootstrapElement = z.infer<typeof elementSchema>;
export type Bootstrap = z.infer<typeof bootstrapSchema>;
export type FixtureStat = z.infer<typeof fixtureStatSchema>;
export type Fixture = z.infer<typeof fixtureSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(`${label} payload is malformed: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseBootstrap(raw: unknown): Bootstrap {
  return parseWith(bootstrapSchema, raw, "Bootstrap");
}

export function parseFixtures(raw: unknown): Fixture[] {
  return parseWith(fixturesSchema, raw, "Fixtures");
}
