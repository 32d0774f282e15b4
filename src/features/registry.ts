/**
 * Feature builder registry — name → builder, populated once by the composition root.
 */

import { FeatureBuilderNotFoundError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { BUILT_IN_BUILDERS } from "./builders.js";
import type { IFeatureBuilder } from "./builders.js";

export class FeatureBuilderRegistry {
  private readonly builders: Map<string, IFeatureBuilder> = new Map();

  register(builder: IFeatureBuilder): void {
    if (this.builders.has(builder.name)) {
      logger.warn({ builder: builder.name }, "Overwriting existing feature builder");
    }
    this.builders.set(builder.name, builder);
  }

  get(name: string): IFeatureBuilder | undefined {
    return this.builders.get(name);
  }

  /**
   * Like get, but an unknown name is an error.
   */
  require(name: string): IFeatureBuilder {
    const builder = this.builders.get(name);
    if (!builder) {
      throw new FeatureBuilderNotFoundError(name);
    }
    return builder;
  }

  has(name: string): boolean {
    return this.builders.has(name);
  }

  list(): readonly string[] {
    return [...this.builders.keys()];
  }

  get size(): number {
    return this.builders.size;
  }
}

export function createDefaultFeatureBuilders(): FeatureBuilderRegistry {
  const registry = new FeatureBuilderRegistry();
  for (const builder of BUILT_IN_BUILDERS) {
    registry.register(builder);
  }
  return registry;
}
