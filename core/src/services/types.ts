export type ServiceScope = 'singleton' | 'request';

export type ServiceFactoryCtx<C = unknown> = {
  config: C;
};

export type ResolveCtx = {
  scope: ServiceScope;
};

/** Services keyed by name; `S` maps each name to the type its factory produces. */
export interface ServiceRegistry<S extends object> {
  register<K extends keyof S & string>(name: K, scope: ServiceScope, factory: (ctx: ServiceFactoryCtx) => S[K]): void;
  resolve<K extends keyof S & string>(name: K, ctx?: ResolveCtx): S[K];
  has(name: keyof S & string): boolean;
}
