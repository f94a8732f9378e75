import { MenuSlot } from "./slot.js";
import type { Menu } from "./types.js";

export type MenuLoader<K> = (key: K) => Promise<Menu>;

/**
 * A navigation entry that builds its child menu on first activation and
 * reuses it while the menu is still alive.
 *
 * - hit: the slot still resolves, the cached instance is returned untouched;
 * - miss: the loader queries the collaborator and the result is slotted;
 * - concurrent activations during a miss share one pending build;
 * - a failed build leaves the slot empty, so the next activation retries.
 */
export class MenuNode<K = unknown> {
  readonly key: K;
  readonly label: string;
  private readonly slot = new MenuSlot<Menu>();
  private readonly load: () => Promise<Menu>;
  private pending: Promise<Menu> | undefined;

  constructor(key: K, label: string, loader: MenuLoader<K>) {
    this.key = key;
    this.label = label;
    this.load = () => loader(key);
  }

  /** True when the next activation will be served from the slot. */
  get isCached(): boolean {
    return !this.slot.isEmpty;
  }

  activate(): Promise<Menu> {
    const cached = this.slot.get();
    if (cached) return Promise.resolve(cached);
    if (this.pending) return this.pending;

    const pending = this.build();
    this.pending = pending;
    const settle = (): void => {
      if (this.pending === pending) this.pending = undefined;
    };
    void pending.then(settle, settle);
    return pending;
  }

  /** Drops the cached menu; the next activation rebuilds it. */
  invalidate(): void {
    this.slot.discard();
  }

  private async build(): Promise<Menu> {
    const menu = await this.load();
    this.slot.set(menu);
    return menu;
  }
}
