import type { RuntimeResource, RuntimeResources } from '@newsroute/core';

export function collectLifecycleResources(resources: RuntimeResources): RuntimeResource[] {
  const ordered: Array<RuntimeResource | null> = [
    resources.sessions,
    resources.news,
    resources.search,
    resources.completion
  ];

  const unique = new Set<RuntimeResource>();
  for (const candidate of ordered) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}
