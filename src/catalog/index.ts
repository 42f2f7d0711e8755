// Research capability catalog

import type { CapabilityRegistry } from '../registry.js';
import type { ResearchBackend } from '../research-backend.js';
import { createResearchPrompts } from './research-prompts.js';
import { createResearchResources } from './research-resources.js';
import { createResearchOperations } from './research-tools.js';

// Registration order is the order clients see in listings.
export function registerResearchCatalog(registry: CapabilityRegistry, backend: ResearchBackend): void {
  for (const operation of createResearchOperations(backend)) {
    registry.register('operation', operation);
  }
  for (const resource of createResearchResources()) {
    registry.register('resource', resource);
  }
  for (const prompt of createResearchPrompts()) {
    registry.register('prompt', prompt);
  }
}
