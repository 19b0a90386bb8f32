import { RuleStore } from './rule-store.js';
import { RulesEngine } from './rules-engine.js';

export type RuleStoreLoader = () => RuleStore;

/**
 * The store that new evaluations use. A reload builds the replacement first
 * and publishes it only once it loaded cleanly; engines already handed out
 * keep the store they were created with.
 */
export class RuleStoreRef {
  private store: RuleStore;

  constructor(
    initial: RuleStore,
    private readonly loader?: RuleStoreLoader,
  ) {
    this.store = initial;
  }

  static fromPath(path: string): RuleStoreRef {
    return new RuleStoreRef(RuleStore.load(path), () => RuleStore.load(path));
  }

  current(): RuleStore {
    return this.store;
  }

  engine(): RulesEngine {
    return new RulesEngine(this.store);
  }

  swap(next: RuleStore): RuleStore {
    const previous = this.store;
    this.store = next;
    return previous;
  }

  /**
   * Rebuild with the configured loader and publish the result. A loader
   * error propagates and the current store stays in place.
   */
  reload(): RuleStore {
    if (!this.loader) {
      throw new Error('RuleStoreRef has no loader; use swap() to publish a store');
    }
    const next = this.loader();
    this.swap(next);
    return next;
  }
}
