import type { Component } from '../../src/types/registry.js';

export function makeComponent(overrides: Partial<Component> & Pick<Component, 'id'>): Component {
  return {
    description: `${overrides.id} component`,
    category: 'framework',
    ecosystem: null,
    isDefaultRuntime: false,
    implies: [],
    conflicts: [],
    dependencies: {},
    versionKey: null,
    service: null,
    devcontainer: { extensions: [], mounts: [] },
    scripts: {},
    ...overrides,
  };
}
