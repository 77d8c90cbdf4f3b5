import { z } from 'zod';

export const DEVCONTAINER_FILE = '.devcontainer/devcontainer.json';

export interface DevcontainerContribution {
  forwardPorts: readonly number[];
  mounts: readonly string[];
  extensions: readonly string[];
}

const DescriptorSchema = z
  .object({
    forwardPorts: z.array(z.union([z.number(), z.string()])).optional(),
    mounts: z.array(z.unknown()).optional(),
    customizations: z
      .object({
        vscode: z
          .object({ extensions: z.array(z.string()).optional() })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type Descriptor = z.infer<typeof DescriptorSchema>;

function union<T>(current: readonly T[], additions: readonly T[]): T[] {
  const out = [...current];
  for (const item of additions) {
    if (!out.includes(item)) out.push(item);
  }
  return out;
}

export function buildDevcontainer(projectName: string, contribution: DevcontainerContribution): string {
  const descriptor = {
    name: projectName,
    build: { dockerfile: 'Dockerfile', context: '..' },
    workspaceFolder: '/workspace',
    workspaceMount: 'source=${localWorkspaceFolder},target=/workspace,type=bind',
    forwardPorts: union([], contribution.forwardPorts),
    mounts: union([], contribution.mounts),
    customizations: {
      vscode: {
        extensions: union([], contribution.extensions),
      },
    },
    postCreateCommand: 'bash .devcontainer/setup.sh',
  };
  return JSON.stringify(descriptor, null, 2) + '\n';
}

/**
 * Unions the contribution into an existing descriptor. Every other key of the
 * descriptor is kept as is. Throws when the text is not a JSON object.
 */
export function mergeDevcontainer(existing: string, contribution: DevcontainerContribution): string {
  const raw: unknown = JSON.parse(existing);
  const record = z.record(z.string(), z.unknown()).safeParse(raw);
  const result = DescriptorSchema.safeParse(raw);
  if (!record.success || !result.success) {
    throw new Error(`${DEVCONTAINER_FILE} is not a descriptor object`);
  }
  const descriptor: Descriptor = result.data;
  const vscode = descriptor.customizations?.vscode ?? {};
  // Spread the untouched record first so existing keys keep their order.
  const merged = {
    ...record.data,
    forwardPorts: union(descriptor.forwardPorts ?? [], contribution.forwardPorts),
    mounts: union(descriptor.mounts ?? [], contribution.mounts),
    customizations: {
      ...descriptor.customizations,
      vscode: {
        ...vscode,
        extensions: union(vscode.extensions ?? [], contribution.extensions),
      },
    },
  };
  return JSON.stringify(merged, null, 2) + '\n';
}
