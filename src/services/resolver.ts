import { ServiceResolutionError } from "../commands/errors";
import { lazy, type Lazy } from "../utils/lazy";

export type ServiceToken = string | symbol;

/**
 * Host-provided service lookup. Throws when the service is unknown.
 */
export interface ServiceResolver {
  resolve(token: ServiceToken): unknown;
}

export interface Constructable<T> {
  new (...services: unknown[]): T;
  readonly name: string;
  readonly inject?: readonly ServiceToken[];
}

/**
 * Minimal in-memory resolver. Factories run on first resolve and the
 * result is shared afterwards.
 */
export class ServiceContainer implements ServiceResolver {
  private services = new Map<ServiceToken, Lazy<unknown>>();

  addSingleton(token: ServiceToken, value: unknown): this {
    this.services.set(token, lazy(() => value));
    return this;
  }

  addFactory(token: ServiceToken, factory: (resolver: ServiceResolver) => unknown): this {
    this.services.set(token, lazy(() => factory(this)));
    return this;
  }

  resolve(token: ServiceToken): unknown {
    const service = this.services.get(token);
    if (!service) throw new ServiceResolutionError(String(token));
    return service.value;
  }
}

/**
 * Builds `type`, resolving its declared `inject` tokens in order.
 */
export function createInstance<T>(resolver: ServiceResolver, type: Constructable<T>): T {
  const services = (type.inject ?? []).map((token) => {
    try {
      return resolver.resolve(token);
    } catch (error) {
      if (error instanceof ServiceResolutionError) throw error;
      throw new ServiceResolutionError(String(token), { cause: error });
    }
  });
  return new type(...services);
}

/**
 * Resolver with no services; enough for converters without dependencies.
 */
export const emptyResolver: ServiceResolver = new ServiceContainer();
