import { z } from 'zod';

// ── Enumerations ────────────────────────────────────────────────────

export const CATEGORIES = [
  'base-runtime',
  'framework',
  'database',
  'cache',
  'vector-store',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const ECOSYSTEMS = ['python', 'node'] as const;

export type Ecosystem = (typeof ECOSYSTEMS)[number];

export const VERSION_KEYS = [
  'python_version',
  'node_version',
  'postgres_version',
  'redis_version',
  'mongodb_version',
] as const;

export type VersionKey = (typeof VERSION_KEYS)[number];

export const FEATURE_FLAGS = ['with-deps', 'with-examples', 'no-git'] as const;

export type FeatureFlag = (typeof FEATURE_FLAGS)[number];

// ── Shared sub-schemas ──────────────────────────────────────────────

const idPattern = /^[a-z0-9][a-z0-9-]*$/;
const volumeNamePattern = /^[a-z0-9][a-z0-9_-]*$/;

const IdSchema = z.string().regex(idPattern, 'Lowercase alphanumeric with hyphens');

const RefListSchema = z
  .object({
    components: z.array(IdSchema).default([]),
  })
  .strict()
  .default({ components: [] });

export const DependencyBlockSchema = z
  .object({
    runtime: z.array(z.string().min(1)).default([]),
    dev: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const DependenciesSchema = z
  .object({
    python: DependencyBlockSchema.optional(),
    node: DependencyBlockSchema.optional(),
  })
  .strict()
  .default({});

const PortSchema = z.number().int().min(1).max(65535);

export const ServiceSchema = z
  .object({
    name: IdSchema,
    default_port: PortSchema,
    container_port: PortSchema,
    image: z.string().min(1).optional(),
    build: z.string().min(1).optional(),
    command: z.string().optional(),
    volumes: z.array(z.string()).default([]),
    named_volumes: z.array(z.string().regex(volumeNamePattern)).default([]),
    depends_on: z.array(IdSchema).default([]),
    environment: z.record(z.string(), z.string()).default({}),
    connection: z.record(z.string(), z.string()).default({}),
  })
  .strict()
  .refine((s) => (s.image === undefined) !== (s.build === undefined), {
    message: 'A service declares exactly one of image or build',
  });

export const DevcontainerHintsSchema = z
  .object({
    extensions: z.array(z.string()).default([]),
    mounts: z.array(z.string()).default([]),
  })
  .strict()
  .default({ extensions: [], mounts: [] });

// ── Catalog files ───────────────────────────────────────────────────

export const ComponentFileSchema = z
  .object({
    component: z
      .object({
        id: IdSchema,
        description: z.string().min(1),
        category: z.enum(CATEGORIES),
        ecosystem: z.enum(['python', 'node', 'none']),
        version_key: z.enum(VERSION_KEYS).optional(),
        default: z.boolean().default(false),
      })
      .strict(),
    implies: RefListSchema,
    conflicts: RefListSchema,
    dependencies: DependenciesSchema,
    service: ServiceSchema.optional(),
    devcontainer: DevcontainerHintsSchema,
    scripts: z.record(z.string(), z.string()).default({}),
  })
  .strict();

export const ProfileFileSchema = z
  .object({
    profile: z
      .object({
        name: IdSchema,
        description: z.string().min(1),
        template: IdSchema.optional(),
      })
      .strict(),
    components: z
      .object({
        ids: z.array(IdSchema).min(1),
      })
      .strict(),
  })
  .strict();

export const TemplateFileSchema = z
  .object({
    template: z
      .object({
        id: IdSchema,
        description: z.string().min(1),
      })
      .strict(),
    dependencies: DependenciesSchema,
  })
  .strict();

export type DependencyBlock = z.infer<typeof DependencyBlockSchema>;

// ── Project state ───────────────────────────────────────────────────

export const ProjectStateSchema = z.object({
  name: z.string().min(1),
  components: z.array(z.string()).default([]),
  versions: z.record(z.string(), z.string()).default({}),
  ports: z.record(z.string(), PortSchema).default({}),
  template: z.string().nullable().default(null),
});

export type ProjectState = z.infer<typeof ProjectStateSchema>;

// ── Selection ───────────────────────────────────────────────────────

export const SelectionSchema = z.object({
  targetDir: z.string().min(1),
  mode: z.enum(['create', 'add']),
  components: z.array(z.string()).default([]),
  profile: z.string().optional(),
  template: z.string().optional(),
  projectName: z.string().optional(),
  versionOverrides: z.record(z.string(), z.string()).default({}),
  features: z.array(z.string()).default([]),
});

export type SelectionInput = z.input<typeof SelectionSchema>;
export type Selection = z.infer<typeof SelectionSchema>;
