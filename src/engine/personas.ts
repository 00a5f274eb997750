import { PersonaModel } from './persona-model';
import { logger } from '../shared/logger';
import { getPersonaSeedsForVariant } from '../shared/persona/roster';
import type { PersonaSeed } from '../shared/persona/types';
import type { PersonaRole } from '../shared/types';

export class PersonaRegistry {
  #personas = new Map<string, PersonaModel>();

  constructor(seeds: PersonaSeed[]) {
    seeds.forEach((seed) => {
      if (this.#personas.has(seed.name)) {
        logger.warn('[personas] Duplicate persona name ignored', { name: seed.name });
        return;
      }
      this.#personas.set(seed.name, new PersonaModel(seed));
    });
  }

  static fromVariant(variantId: string): PersonaRegistry {
    return new PersonaRegistry(getPersonaSeedsForVariant(variantId));
  }

  get(name: string): PersonaModel | undefined {
    return this.#personas.get(name);
  }

  byRole(role: PersonaRole): PersonaModel | undefined {
    return this.list().find((persona) => persona.role === role);
  }

  list(): PersonaModel[] {
    return Array.from(this.#personas.values());
  }

  names(): string[] {
    return Array.from(this.#personas.keys());
  }

  get size() {
    return this.#personas.size;
  }
}
