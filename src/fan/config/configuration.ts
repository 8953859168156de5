/**
 * Fan Controller Configuration
 *
 * Builds the effective FanPolicy from defaults, an optional YAML/JSON file
 * and command-line overrides, then enforces the threshold invariants.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../errors.js';
import type { FanPolicy, Thresholds } from '../types/fan-policy.js';

export type PolicyInput = Record<string, unknown>;

export interface LoadFanPolicyOptions {
  /** YAML or JSON file; values here override the defaults */
  file?: string;
  /** Highest-precedence values, typically from the command line */
  overrides?: PolicyInput;
}

/**
 * Creates the default policy.
 *
 * Manual control starts at 55°C (ten degrees above the 45°C idle target)
 * and the curve runs from 50% duty there to 100% at 80°C.
 */
export function createDefaultFanPolicy(): FanPolicy {
  return {
    monitoring: {
      interval: 3,
      commandTimeout: 10,
      maxConsecutiveFailures: 5,
    },
    thresholds: {
      enterManualC: 55,
      exitManualC: 45,
      curveMinC: 55,
      curveMaxC: 80,
      minDutyPct: 50,
      maxDutyPct: 100,
    },
    handoff: {
      delay: 0,
    },
    devices: {
      ignore: [],
    },
    actuator: {
      retries: 2,
      retryDelay: 500,
    },
    tools: {
      nvidiaSmi: 'nvidia-smi',
      ipmitool: 'ipmitool',
    },
  };
}

const DEFAULTS = createDefaultFanPolicy();

// A blank YAML key (`exitManualC:`) or flag (`--min-duty ""`) must fail
// validation, never coerce to 0
function toNumberInput(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length === 0 ? undefined : Number(trimmed);
  }
  return value;
}

function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(toNumberInput, schema);
}

const number = () => z.number({ required_error: 'must not be blank', invalid_type_error: 'must be a number' });

const celsius = numeric(number().finite());
const dutyPercent = numeric(number().int().min(0).max(100));

export const FanPolicySchema = z.object({
  monitoring: z.object({
    interval: numeric(number().positive()).default(DEFAULTS.monitoring.interval),
    commandTimeout: numeric(number().positive()).default(DEFAULTS.monitoring.commandTimeout),
    maxConsecutiveFailures: numeric(number().int().min(1)).default(DEFAULTS.monitoring.maxConsecutiveFailures),
  }).strict().default({}),
  thresholds: z.object({
    enterManualC: celsius.default(DEFAULTS.thresholds.enterManualC),
    exitManualC: celsius.default(DEFAULTS.thresholds.exitManualC),
    curveMinC: celsius.default(DEFAULTS.thresholds.curveMinC),
    curveMaxC: celsius.default(DEFAULTS.thresholds.curveMaxC),
    minDutyPct: dutyPercent.default(DEFAULTS.thresholds.minDutyPct),
    maxDutyPct: dutyPercent.default(DEFAULTS.thresholds.maxDutyPct),
  }).strict().default({}),
  handoff: z.object({
    delay: numeric(number().min(0)).default(DEFAULTS.handoff.delay),
    idleUtilization: numeric(number().min(0).max(100)).optional(),
  }).strict().default({}),
  devices: z.object({
    ignore: z.array(numeric(number().int().min(0))).default([]),
    sanityRange: z.object({
      min: celsius,
      max: celsius,
    }).strict().optional(),
  }).strict().default({}),
  actuator: z.object({
    retries: numeric(number().int().min(0)).default(DEFAULTS.actuator.retries),
    retryDelay: numeric(number().min(0)).default(DEFAULTS.actuator.retryDelay),
  }).strict().default({}),
  tools: z.object({
    nvidiaSmi: z.string().min(1).default(DEFAULTS.tools.nvidiaSmi),
    ipmitool: z.string().min(1).default(DEFAULTS.tools.ipmitool),
  }).strict().default({}),
}).strict();

/**
 * Validates the cross-field threshold invariants, returning every violation
 */
export function validateThresholds(thresholds: Thresholds): string[] {
  const errors: string[] = [];

  if (!(thresholds.enterManualC > thresholds.exitManualC)) {
    errors.push(
      `enterManualC (${thresholds.enterManualC}) must be greater than exitManualC (${thresholds.exitManualC}); ` +
      'a zero or negative hysteresis band lets the fan mode oscillate',
    );
  }
  if (!(thresholds.curveMinC < thresholds.curveMaxC)) {
    errors.push(`curveMinC (${thresholds.curveMinC}) must be less than curveMaxC (${thresholds.curveMaxC})`);
  }
  if (!(thresholds.minDutyPct < thresholds.maxDutyPct)) {
    errors.push(`minDutyPct (${thresholds.minDutyPct}) must be less than maxDutyPct (${thresholds.maxDutyPct})`);
  }

  return errors;
}

export function validateFanPolicy(policy: FanPolicy): string[] {
  const errors = validateThresholds(policy.thresholds);
  const range = policy.devices.sanityRange;
  if (range && !(range.min < range.max)) {
    errors.push(`sanityRange.min (${range.min}) must be less than sanityRange.max (${range.max})`);
  }
  return errors;
}

/**
 * Parses raw configuration input into a validated FanPolicy
 */
export function parseFanPolicy(input: unknown): FanPolicy {
  const result = FanPolicySchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues, result.error);
  }

  const policy: FanPolicy = result.data;
  const errors = validateFanPolicy(policy);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, errors);
  }

  return policy;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merges `source` into `target`; undefined values in `source` are skipped
 */
export function mergePolicyInput(target: PolicyInput, source: PolicyInput): PolicyInput {
  const result: PolicyInput = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value)
      ? mergePolicyInput(existing, value)
      : value;
  }
  return result;
}

export function readPolicyFile(path: string): PolicyInput {
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`, [`file: ${path} does not exist`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf8'));
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(`Failed to parse configuration file ${path}: ${cause.message}`, [cause.message], cause);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file ${path} must contain a mapping`, [`file: ${path} is not a mapping`]);
  }
  return parsed;
}

/**
 * Loads configuration merged in order: defaults <- file <- overrides
 */
export function loadFanPolicy(options: LoadFanPolicyOptions = {}): FanPolicy {
  let raw: PolicyInput = {};

  if (options.file) {
    raw = mergePolicyInput(raw, readPolicyFile(options.file));
  }
  if (options.overrides) {
    raw = mergePolicyInput(raw, options.overrides);
  }

  return parseFanPolicy(raw);
}

/**
 * Splits a GPU index list such as `0` or `0, 2`
 */
export function parseIndexList(value: string): string[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}
