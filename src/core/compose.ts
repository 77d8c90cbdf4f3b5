import yaml from 'js-yaml';
import { z } from 'zod';
import { GenerationError } from './errors.js';

export const COMPOSE_FILE = 'docker-compose.yml';

// ── Document shape ──────────────────────────────────────────────────

export interface ComposeService {
  image?: string;
  build?: { context: string; dockerfile: string };
  command?: string;
  ports: string[];
  volumes?: string[];
  environment?: Record<string, string>;
  depends_on?: string[];
}

/**
 * Services of an existing file are kept as opaque mappings so that anything
 * a user added by hand survives a merge.
 */
export interface ComposeDocument {
  services: Record<string, ComposeService | Record<string, unknown>>;
  volumes?: Record<string, Record<string, unknown> | null>;
  [key: string]: unknown;
}

const ComposeFileSchema = z
  .object({
    services: z.record(z.string(), z.record(z.string(), z.unknown())).nullable().default({}),
    volumes: z.record(z.string(), z.record(z.string(), z.unknown()).nullable()).nullable().optional(),
  })
  .passthrough();

export function parseCompose(text: string): ComposeDocument {
  const data = yaml.load(text) ?? {};
  const result = ComposeFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  const { services, volumes, ...rest } = result.data;
  const doc: ComposeDocument = { ...rest, services: services ?? {} };
  if (volumes) doc.volumes = volumes;
  return doc;
}

export function renderCompose(doc: ComposeDocument): string {
  return yaml.dump(doc, { lineWidth: -1, noRefs: true, sortKeys: false });
}

// ── Ports ───────────────────────────────────────────────────────────

const PortEntrySchema = z.union([
  z.string(),
  z.number(),
  z.object({ published: z.union([z.string(), z.number()]).optional() }).passthrough(),
]);

function hostPortOf(entry: unknown): number | null {
  const parsed = PortEntrySchema.safeParse(entry);
  if (!parsed.success) return null;
  const value = parsed.data;
  if (typeof value === 'number') return null;
  if (typeof value === 'object') {
    const published = Number(value.published);
    return Number.isInteger(published) ? published : null;
  }
  // "8000:8000", "127.0.0.1:8000:8000", "8000:8000/tcp"
  const parts = value.split('/')[0].split(':');
  if (parts.length < 2) return null;
  const port = Number(parts[parts.length - 2]);
  return Number.isInteger(port) ? port : null;
}

/** Host ports bound by the document's services, ascending. */
export function hostPorts(doc: ComposeDocument): number[] {
  const ports = new Set<number>();
  for (const service of Object.values(doc.services)) {
    const entries: unknown = service.ports;
    if (!Array.isArray(entries)) continue;
    for (const entry of entries) {
      const port = hostPortOf(entry);
      if (port !== null) ports.add(port);
    }
  }
  return [...ports].sort((a, b) => a - b);
}

export interface PortRequest {
  componentId: string;
  defaultPort: number;
}

const MAX_PORT = 65535;

/**
 * Assigns a host port to each request in order. Each takes its persisted port
 * when it has one, else its default, moved up to the first integer not yet
 * taken by `reserved`, by another component's persisted port, or by an
 * earlier request.
 */
export function assignPorts(
  requests: readonly PortRequest[],
  persisted: Readonly<Record<string, number>>,
  reserved: readonly number[] = [],
): Record<string, number> {
  const requested = new Set(requests.map((r) => r.componentId));
  const taken = new Set<number>(reserved);
  for (const [id, port] of Object.entries(persisted)) {
    if (!requested.has(id)) taken.add(port);
  }

  const assigned: Record<string, number> = {};
  for (const { componentId, defaultPort } of requests) {
    let port = persisted[componentId] ?? defaultPort;
    while (taken.has(port)) {
      port++;
      if (port > MAX_PORT) {
        throw new GenerationError(`No free host port for ${componentId}`, [COMPOSE_FILE]);
      }
    }
    taken.add(port);
    assigned[componentId] = port;
  }
  return assigned;
}

// ── Merging ─────────────────────────────────────────────────────────

export interface ComposeContribution {
  services: ReadonlyArray<{ name: string; definition: ComposeService }>;
  volumes: readonly string[];
}

/** Builds a fresh document from staged contributions. */
export function buildCompose(contribution: ComposeContribution): ComposeDocument {
  return mergeCompose({ services: {} }, contribution);
}

/**
 * Adds contributed services and named volumes that the document does not
 * already have. Existing entries are never modified.
 */
export function mergeCompose(existing: ComposeDocument, contribution: ComposeContribution): ComposeDocument {
  const services = { ...existing.services };
  for (const { name, definition } of contribution.services) {
    if (!(name in services)) services[name] = definition;
  }

  const doc: ComposeDocument = { ...existing, services };
  const volumes = { ...(existing.volumes ?? {}) };
  let volumesChanged = false;
  for (const volume of contribution.volumes) {
    if (!(volume in volumes)) {
      volumes[volume] = {};
      volumesChanged = true;
    }
  }
  if (existing.volumes || volumesChanged) doc.volumes = volumes;
  return doc;
}
