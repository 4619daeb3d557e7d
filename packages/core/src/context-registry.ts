import { RegistryError } from "./errors";
import { WebRequestRegistry } from "./web-request";

/**
 * Owning context to registry association, keyed by context identity.
 * Entries leave only through `onContextDestroyed`.
 */
export class ContextRegistry<C extends object = object> {
  private registries = new Map<C, WebRequestRegistry<C>>();

  get size() {
    return this.registries.size;
  }

  from(context: C | null | undefined): WebRequestRegistry<C> | undefined {
    if (!context) {
      return undefined;
    }
    return this.registries.get(context);
  }

  require(context: C): WebRequestRegistry<C> {
    const registry = this.from(context);
    if (!registry) {
      throw new RegistryError("NOT_FOUND", "No web request registry exists for this context");
    }
    return registry;
  }

  getOrCreate(context: C): WebRequestRegistry<C> {
    return this.from(context) ?? this.createExclusive(context);
  }

  createExclusive(context: C): WebRequestRegistry<C> {
    if (this.registries.has(context)) {
      throw new RegistryError("ALREADY_EXISTS", "A web request registry already exists for this context");
    }
    const registry = new WebRequestRegistry(context);
    this.registries.set(context, registry);
    return registry;
  }

  onContextDestroyed(context: C): boolean {
    const registry = this.registries.get(context);
    if (!registry) {
      return false;
    }
    this.registries.delete(context);
    registry.destroy();
    return true;
  }
}
