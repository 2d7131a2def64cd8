import { readFile } from 'node:fs/promises';
import { z, ZodError } from 'zod';
import { RankingProfileSchema } from '../schemas.js';
import type { RankingProfile } from '../schemas.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('config');

export const formatZodError = (error: ZodError) => {
  return z.prettifyError(error);
};

export const ProfilesFileSchema = z
  .object({
    profiles: z.array(RankingProfileSchema).min(1),
  })
  .superRefine(({ profiles }, ctx) => {
    const seen = new Set<string>();
    profiles.forEach((profile, index) => {
      if (seen.has(profile.name)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate profile name: ${profile.name}`,
          path: ['profiles', index, 'name'],
        });
      }
      seen.add(profile.name);
    });
  });

/**
 * Validates ranking profiles from their JSON text.
 */
export function parseProfiles(json: string): RankingProfile[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(
      `Profiles are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = ProfilesFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ranking profiles:\n${formatZodError(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data.profiles;
}

export async function loadProfiles(path: string): Promise<RankingProfile[]> {
  let json: string;
  try {
    json = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Could not read ranking profiles from ${path}`, {
      cause: error,
    });
  }
  const profiles = parseProfiles(json);
  logger.info(
    `Loaded ${profiles.length} ranking profiles from ${path}: ${profiles.map((p) => p.name).join(', ')}`
  );
  return profiles;
}
