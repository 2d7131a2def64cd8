import { z } from 'zod';

export const MEDIA_KINDS = ['movie', 'show'] as const;
export type MediaKind = (typeof MEDIA_KINDS)[number];

export const MediaTargetSchema = z.object({
  kind: z.enum(MEDIA_KINDS),
  externalId: z.string().trim().min(1),
  seasons: z.array(z.number().int().nonnegative()).default([]),
  episode: z.number().int().nonnegative().optional(),
});

/**
 * What is being resolved. `seasons` is sorted and deduplicated; an empty list
 * means no season was specified.
 */
export interface MediaTarget {
  readonly kind: MediaKind;
  readonly externalId: string;
  readonly seasons: readonly number[];
  readonly episode?: number;
}

export type MediaTargetInput = z.input<typeof MediaTargetSchema>;

/**
 * Validates a target and freezes it, with its seasons sorted and deduplicated.
 * Throws a ZodError on invalid input.
 */
export function createMediaTarget(input: MediaTargetInput): MediaTarget {
  const { kind, externalId, seasons, episode } = MediaTargetSchema.parse(input);
  const target: MediaTarget = {
    kind,
    externalId,
    seasons: Object.freeze([...new Set(seasons)].sort((a, b) => a - b)),
    ...(episode !== undefined ? { episode } : {}),
  };
  return Object.freeze(target);
}

/** Coalescer slot identity of a target. */
export function targetKey(target: MediaTarget): string {
  return [
    target.kind,
    target.externalId,
    target.seasons.join(','),
    target.episode ?? '',
  ].join(':');
}

/** One search result as reported by a source, before parsing. */
export const RawEntrySchema = z.object({
  title: z.string().trim().min(1),
  contentHash: z.string().regex(/^[0-9a-f]{40}$/i, 'Invalid info hash'),
});

export type RawEntry = z.infer<typeof RawEntrySchema>;

export interface FileEntry {
  readonly id: string;
  readonly name: string;
  readonly sizeGB: number;
  readonly isVideo: boolean;
  readonly isSubtitle: boolean;
  readonly season?: number;
  readonly episode?: number;
}

/**
 * One file grouping reported by the debrid service for a hash. Only built by
 * `createVersion`, which derives every aggregate from `files`.
 */
export interface Version {
  readonly files: readonly FileEntry[];
  readonly totalSizeGB: number;
  readonly videoCount: number;
  readonly subtitleCount: number;
  readonly episodeCount: number;
  readonly seasons: readonly number[];
}

export interface Candidate {
  title: string;
  languages: string[];
  /** Vertical resolution, 0 when unknown. */
  resolution: number;
  sizeGB: number;
  seeders: number;
  sourceGroup: string;
  /** Lowercase info hash, the cache lookup key. */
  contentHash: string;
  magnetURI: string;
  /** Codes of the debrid providers the release is cached on. */
  cached: string[];
  /** Primary version first. */
  versions: Version[];
  videoCount: number;
  episodeCount: number;
  seasons: number[];
  kind?: MediaKind;
}

export interface ResolutionHandle {
  readonly id: string;
  readonly candidates: readonly Candidate[];
}

export type ResolutionResult = Record<string, ResolutionHandle>;

// Candidate fields that ranking profiles may read.
export const STRING_FIELDS = ['title', 'sourceGroup', 'kind'] as const;
export const NUMERIC_FIELDS = [
  'resolution',
  'sizeGB',
  'seeders',
  'videoCount',
  'episodeCount',
  'versionCount',
] as const;
export const STRING_LIST_FIELDS = ['languages', 'cached'] as const;
export const NUMBER_LIST_FIELDS = ['seasons'] as const;

export type StringField = (typeof STRING_FIELDS)[number];
export type NumericField = (typeof NUMERIC_FIELDS)[number];
export type StringListField = (typeof STRING_LIST_FIELDS)[number];
export type NumberListField = (typeof NUMBER_LIST_FIELDS)[number];
export type ListField = StringListField | NumberListField;

const StringFieldSchema = z.enum(STRING_FIELDS);
const NumericFieldSchema = z.enum(NUMERIC_FIELDS);
const StringListFieldSchema = z.enum(STRING_LIST_FIELDS);
const NumberListFieldSchema = z.enum(NUMBER_LIST_FIELDS);

const isValidPattern = (pattern: string, flags: string | undefined) => {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
};

export const FieldPredicateSchema = z.union([
  z.object({
    field: NumericFieldSchema,
    op: z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte']),
    value: z.number(),
  }),
  z.object({
    field: StringFieldSchema,
    op: z.enum(['eq', 'neq']),
    value: z.string(),
  }),
  z.object({
    field: NumericFieldSchema,
    op: z.enum(['in', 'notIn']),
    values: z.array(z.number()),
  }),
  z.object({
    field: StringFieldSchema,
    op: z.enum(['in', 'notIn']),
    values: z.array(z.string()),
  }),
  z.object({
    field: StringListFieldSchema,
    op: z.enum(['includes', 'excludes']),
    value: z.string(),
  }),
  z.object({
    field: NumberListFieldSchema,
    op: z.enum(['includes', 'excludes']),
    value: z.number(),
  }),
  z
    .object({
      field: StringFieldSchema,
      op: z.enum(['matches', 'notMatches']),
      pattern: z.string().min(1),
      flags: z
        .string()
        .regex(/^[imsu]*$/)
        .optional(),
    })
    .refine((p) => isValidPattern(p.pattern, p.flags), {
      message: 'Invalid regular expression',
      path: ['pattern'],
    }),
]);

export type FieldPredicate = z.infer<typeof FieldPredicateSchema>;

/**
 * A filter over a read-only view of a Candidate. Either a single field test
 * or a combination of predicates.
 */
export type Predicate =
  | FieldPredicate
  | { all: Predicate[] }
  | { any: Predicate[] }
  | { not: Predicate };

export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    FieldPredicateSchema,
    z.object({ all: z.array(PredicateSchema) }),
    z.object({ any: z.array(PredicateSchema) }),
    z.object({ not: PredicateSchema }),
  ])
);

export const SortKeySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('field'),
    field: z.union([NumericFieldSchema, StringListFieldSchema, NumberListFieldSchema]),
    invert: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('match'),
    when: PredicateSchema,
  }),
  z.object({
    type: z.literal('preference'),
    field: z.union([StringFieldSchema, StringListFieldSchema]),
    values: z.array(z.string()).min(1),
  }),
]);

export type SortKey = z.infer<typeof SortKeySchema>;

export const RankingProfileSchema = z.object({
  name: z.string().trim().min(1),
  resultLimit: z.number().int().positive(),
  filters: z.array(PredicateSchema).default([]),
  sortRules: z.array(SortKeySchema).default([]),
});

export type RankingProfile = z.infer<typeof RankingProfileSchema>;
