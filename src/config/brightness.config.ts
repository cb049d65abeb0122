/**
 * Brightness configuration file
 * =============================
 * brightness_config.json:
 *
 *   brightness_function.parameters  amplitude, base_level, cycle_hours, offset_hours
 *   zipcode_config                  zipcode, use_sunrise_sunset, sunrise/sunset targets, modifier bounds
 *
 * Parsed into the CurveParameters + SolarConfig pair the core works with.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../common/errors.js';
import type { CurveParameters } from '../modules/curve/curve.types.js';
import type { SolarConfig } from '../modules/solar/solar.types.js';
import { formatIssues } from './env.js';

const curveSchema = z.object({
  type: z.literal('sinusoidal').default('sinusoidal'),
  parameters: z.object({
    amplitude: z.number().positive(),
    base_level: z.number().min(0).max(100),
    cycle_hours: z.number().positive().default(24),
    offset_hours: z.number().finite().default(0),
  }),
});

const zipcodeSchema = z.object({
  zipcode: z.string().trim().optional(),
  country: z.string().trim().min(2).default('us'),
  use_sunrise_sunset: z.boolean().default(false),
  sunrise_brightness: z.number().finite().default(40),
  sunset_brightness: z.number().finite().default(20),
  min_modifier: z.number().finite().default(0),
  max_modifier: z.number().finite().default(100),
})
  .refine(cfg => cfg.min_modifier <= cfg.max_modifier, {
    message: 'min_modifier must not exceed max_modifier',
    path: ['min_modifier'],
  })
  .refine(cfg => !cfg.use_sunrise_sunset || Boolean(cfg.zipcode), {
    message: 'zipcode is required when use_sunrise_sunset is true',
    path: ['zipcode'],
  });

const brightnessConfigSchema = z.object({
  brightness_function: curveSchema,
  zipcode_config: zipcodeSchema.optional(),
});

export interface BrightnessConfig {
  curve: CurveParameters;
  solar: SolarConfig;
}

export function parseBrightnessConfig(raw: unknown): BrightnessConfig {
  const parsed = brightnessConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid brightness configuration: ${issues.join('; ')}`, issues);
  }

  const { parameters } = parsed.data.brightness_function;
  const zip = parsed.data.zipcode_config;

  return {
    curve: {
      amplitude: parameters.amplitude,
      baseLevel: parameters.base_level,
      cycleHours: parameters.cycle_hours,
      phaseOffsetHours: parameters.offset_hours,
    },
    solar: {
      locationKey: zip?.zipcode ?? '',
      country: zip?.country ?? 'us',
      enabled: zip?.use_sunrise_sunset ?? false,
      sunriseBrightness: zip?.sunrise_brightness ?? 40,
      sunsetBrightness: zip?.sunset_brightness ?? 20,
      minModifier: zip?.min_modifier ?? 0,
      maxModifier: zip?.max_modifier ?? 100,
    },
  };
}

export async function loadBrightnessConfig(configPath: string): Promise<BrightnessConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read brightness configuration at ${configPath}: ${errorMessage(err)}`, [], { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Brightness configuration at ${configPath} is not valid JSON: ${errorMessage(err)}`, [], { cause: err });
  }

  return parseBrightnessConfig(raw);
}
