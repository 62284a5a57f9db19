import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { Faker, base, en } from "@faker-js/faker";
import { ConfigError } from "./errors.js";
import { Random } from "./random.js";
import { createClock, isCalendarDate, type ReferenceClock } from "./time.js";

export type ShortfallPolicy = "accept" | "fail";

/** Bounded-attempt pairing: how many draws per requested row, and what to do when they run out. */
export interface PairingPolicy {
  /** Overrides each generator's own factor when set. */
  attemptFactor?: number;
  onShortfall: ShortfallPolicy;
}

export interface SchedulingPolicy {
  slotAttempts: number;
  onConflict: ShortfallPolicy;
}

export interface FixtureConfig {
  referenceDate: string;
  pairing: PairingPolicy;
  scheduling: SchedulingPolicy;
}

export const DEFAULT_CONFIG: FixtureConfig = {
  referenceDate: "2025-09-21",
  pairing: { onShortfall: "accept" },
  scheduling: { slotAttempts: 20, onConflict: "accept" },
};

const policySchema = z.enum(["accept", "fail"]);

const configSchema = z
  .object({
    referenceDate: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, "referenceDate must be YYYY-MM-DD")
      .refine(isCalendarDate, "referenceDate is not a calendar date")
      .optional(),
    pairing: z
      .object({
        attemptFactor: z.number().int().positive().optional(),
        onShortfall: policySchema.optional(),
      })
      .strict()
      .optional(),
    scheduling: z
      .object({
        slotAttempts: z.number().int().positive().optional(),
        onConflict: policySchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FixtureConfigInput = z.infer<typeof configSchema>;

/** Overlay a partial configuration on the defaults. */
export function resolveConfig(input: FixtureConfigInput = {}): FixtureConfig {
  return {
    referenceDate: input.referenceDate ?? DEFAULT_CONFIG.referenceDate,
    pairing: {
      attemptFactor: input.pairing?.attemptFactor ?? DEFAULT_CONFIG.pairing.attemptFactor,
      onShortfall: input.pairing?.onShortfall ?? DEFAULT_CONFIG.pairing.onShortfall,
    },
    scheduling: {
      slotAttempts: input.scheduling?.slotAttempts ?? DEFAULT_CONFIG.scheduling.slotAttempts,
      onConflict: input.scheduling?.onConflict ?? DEFAULT_CONFIG.scheduling.onConflict,
    },
  };
}

/**
 * Parse a YAML configuration document. An empty document yields the defaults;
 * unknown keys and wrongly-typed values are rejected.
 */
export function parseConfig(yamlString: string): FixtureConfig {
  let raw: unknown;
  try {
    // No timestamp type: an unquoted date stays the text that was written.
    raw = yaml.load(yamlString, { schema: yaml.CORE_SCHEMA });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config: ${reason}`);
  }
  if (raw === undefined || raw === null) {
    return resolveConfig();
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${detail}`);
  }
  return resolveConfig(parsed.data);
}

export function loadConfig(filePath: string): FixtureConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, { filePath });
  }
  return parseConfig(fs.readFileSync(filePath, "utf-8"));
}

/** Everything a generator needs from its run: randomness, "today" and policies. */
export interface GeneratorContext {
  random: Random;
  faker: Faker;
  clock: ReferenceClock;
  config: FixtureConfig;
}

export function createContext(
  seed: number,
  config: FixtureConfig = DEFAULT_CONFIG
): GeneratorContext {
  const random = new Random(seed);
  const faker = new Faker({ locale: [en, base], randomizer: random });
  return {
    random,
    faker,
    clock: createClock(config.referenceDate),
    config,
  };
}
