import { logger as rootLogger } from '@tickwork/shared/Utils/logger.js';
import { ResolutionError } from '../utils/errors.js';
import type { Invocable, InvocableResolver, InvocableType, ResolutionScope } from '../schedule/types.js';

export interface InvocableFactoryContext {
  /** Parameters bound with `scheduleWithParams`, empty otherwise. */
  parameters: readonly unknown[];
}

export type InvocableFactory<T extends Invocable = Invocable> = (context: InvocableFactoryContext) => T | Promise<T>;

interface Disposable {
  dispose(): void | Promise<void>;
}

function isDisposable(value: object): value is Disposable {
  return 'dispose' in value && typeof value.dispose === 'function';
}

/**
 * Factory-backed {@link InvocableResolver}. Each scope builds fresh instances
 * and disposes the ones that expose `dispose()` when the scope ends.
 */
export class InvocableRegistry implements InvocableResolver {
  private readonly factories = new Map<InvocableType, InvocableFactory>();

  register<T extends Invocable>(type: InvocableType<T>, factory: InvocableFactory<T>): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: InvocableType): boolean {
    return this.factories.has(type);
  }

  createScope(): ResolutionScope {
    return new RegistryScope(this.factories);
  }
}

class RegistryScope implements ResolutionScope {
  private readonly created: Disposable[] = [];
  private disposed = false;
  private logger = rootLogger.child('resolution-scope');

  constructor(private readonly factories: ReadonlyMap<InvocableType, InvocableFactory>) {}

  async resolve<T extends Invocable>(type: InvocableType<T>, parameters: readonly unknown[]): Promise<T> {
    if (this.disposed) {
      throw new ResolutionError(`Cannot resolve ${type.name} from a disposed scope`, type.name);
    }

    const factory = this.factories.get(type);
    if (!factory) {
      throw new ResolutionError(`No factory registered for ${type.name}`, type.name);
    }

    let instance: Invocable;
    try {
      instance = await factory({ parameters });
    } catch (error) {
      throw new ResolutionError(`Factory for ${type.name} failed`, type.name, { cause: error });
    }

    if (!(instance instanceof type)) {
      throw new ResolutionError(`Factory for ${type.name} returned a different type`, type.name);
    }
    if (isDisposable(instance)) {
      this.created.push(instance);
    }
    return instance;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    // Dispose in reverse creation order; one failing disposal must not skip the rest.
    for (const instance of this.created.reverse()) {
      try {
        await instance.dispose();
      } catch (error) {
        this.logger.error('Failed to dispose resolved invocable', { error });
      }
    }
    this.created.length = 0;
  }
}
