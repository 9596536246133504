import type { ResolveCtx, ServiceFactoryCtx, ServiceRegistry, ServiceScope } from './types.js';

type Registration<T> = {
  scope: ServiceScope;
  factory: (ctx: ServiceFactoryCtx) => T;
  singleton?: { value: T };
};

type Registrations<S> = { [K in keyof S]?: Registration<S[K]> };

export class DefaultServiceRegistry<S extends object> implements ServiceRegistry<S> {
  private readonly registrations: Registrations<S> = {};
  private readonly defaultFactoryCtx: ServiceFactoryCtx;

  constructor(config: unknown = {}) {
    this.defaultFactoryCtx = { config };
  }

  register<K extends keyof S & string>(name: K, scope: ServiceScope, factory: (ctx: ServiceFactoryCtx) => S[K]): void {
    if (!name) throw new Error('Service name is required');
    if (this.registrations[name]) throw new Error(`Service already registered: ${name}`);
    this.registrations[name] = { scope, factory };
  }

  /** Registers or replaces; a replaced singleton is rebuilt on next resolve. */
  override<K extends keyof S & string>(name: K, scope: ServiceScope, factory: (ctx: ServiceFactoryCtx) => S[K]): void {
    this.registrations[name] = { scope, factory };
  }

  resolve<K extends keyof S & string>(name: K, ctx?: ResolveCtx): S[K] {
    const reg = this.registrations[name];
    if (!reg) throw new Error(`Unknown service: ${name}`);
    if (ctx && ctx.scope !== reg.scope) {
      throw new Error(`Service ${name} is ${reg.scope}-scoped, not ${ctx.scope}-scoped`);
    }

    if (reg.scope === 'singleton') {
      if (!reg.singleton) reg.singleton = { value: reg.factory(this.defaultFactoryCtx) };
      return reg.singleton.value;
    }
    return reg.factory(this.defaultFactoryCtx);
  }

  has(name: keyof S & string): boolean {
    return this.registrations[name] !== undefined;
  }
}
