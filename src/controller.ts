import { InvariantError, describeError } from "./errors.js";
import { describeDetail } from "./helpers/detail.js";
import { highlightedRow, createInitialState, reduceBrowserState } from "./helpers/state.js";
import { wrapTextToLines } from "./helpers/wrap.js";
import { type Logger, createSilentLogger } from "./logger.js";
import { createRootNode } from "./menu/builders.js";
import type { MenuNode } from "./menu/node.js";
import type { Platform, RegistryClient } from "./registry/types.js";
import type { BrowserAction, BrowserCommand, BrowserState, PaneId } from "./types.js";

export type BrowserControllerOptions = Readonly<{
  client: RegistryClient;
  registryUrl: string;
  preferredPlatform?: Platform | undefined;
  logger?: Logger;
}>;

type Listener = (state: BrowserState) => void;

const DEFAULT_PAGE_ROWS = 10;
const DEFAULT_DETAIL_WIDTH = 40;
const DEFAULT_DETAIL_ROWS = 10;

/**
 * Owns the browser state and runs commands against it.
 *
 * Commands are queued: each one, including the registry query it may trigger,
 * finishes and is reduced into state before the next one starts.
 */
export class BrowserController {
  private state: BrowserState = createInitialState();
  private readonly listeners = new Set<Listener>();
  private readonly root: MenuNode<string>;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();
  private pageRows = DEFAULT_PAGE_ROWS;
  private detailWidth = DEFAULT_DETAIL_WIDTH;
  private detailRows = DEFAULT_DETAIL_ROWS;

  constructor(options: BrowserControllerOptions) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "controller" });
    this.root = createRootNode(
      { client: options.client, preferredPlatform: options.preferredPlatform },
      options.registryUrl,
    );
  }

  getState(): BrowserState {
    return this.state;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Rows moved by page-up/page-down; follows the visible pane height. */
  setPageRows(rows: number): void {
    this.pageRows = Math.max(1, Math.floor(rows));
  }

  /** Text area of the detail pane; bounds how far it scrolls. */
  setDetailViewport(width: number, rows: number): void {
    this.detailWidth = Math.max(1, Math.floor(width));
    this.detailRows = Math.max(0, Math.floor(rows));
  }

  /** Opens the namespaces menu. */
  start(): Promise<void> {
    return this.enqueue(() => this.open(this.root, "namespaces"));
  }

  dispatch(command: BrowserCommand): Promise<void> {
    return this.enqueue(() => this.execute(command));
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    // The chain keeps draining after a failed task; the caller sees the rejection through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async execute(command: BrowserCommand): Promise<void> {
    switch (command) {
      case "move-up":
        this.apply({ type: "move-cursor", delta: -1 });
        return;
      case "move-down":
        this.apply({ type: "move-cursor", delta: 1 });
        return;
      case "page-up":
        this.apply({ type: "move-cursor", delta: -this.pageRows });
        return;
      case "page-down":
        this.apply({ type: "move-cursor", delta: this.pageRows });
        return;
      case "first":
        this.apply({ type: "set-cursor", pane: this.state.focus, index: 0 });
        return;
      case "last":
        this.apply({ type: "set-cursor", pane: this.state.focus, index: Number.MAX_SAFE_INTEGER });
        return;
      case "back":
        this.apply({ type: "focus-back" });
        return;
      case "focus-next":
        this.apply({ type: "focus-next" });
        return;
      case "focus-prev":
        this.apply({ type: "focus-prev" });
        return;
      case "toggle-detail":
        this.apply({ type: "toggle-detail" });
        return;
      case "toggle-help":
        this.apply({ type: "toggle-help" });
        return;
      case "scroll-detail-down":
        this.scrollDetail(1);
        return;
      case "scroll-detail-up":
        this.scrollDetail(-1);
        return;
      case "activate": {
        const row = highlightedRow(this.state);
        if (row?.kind === "node") await this.open(row.node, row.target);
        return;
      }
      case "refresh":
        await this.refresh();
        return;
      case "quit":
        return;
    }
  }

  private async refresh(): Promise<void> {
    const row = highlightedRow(this.state);
    if (row?.kind === "node") {
      row.node.invalidate();
      await this.open(row.node, row.target);
      return;
    }
    if (row === null && this.state.focus === "namespaces") {
      this.root.invalidate();
      await this.open(this.root, "namespaces");
    }
  }

  private scrollDetail(delta: number): void {
    const lines = wrapTextToLines(describeDetail(this.state).body, this.detailWidth);
    this.apply({ type: "scroll-detail", delta, limit: lines.length - this.detailRows });
  }

  private async open(node: MenuNode, target: PaneId): Promise<void> {
    const cached = node.isCached;
    if (!cached) this.apply({ type: "activation-started", heading: node.label });

    try {
      const menu = await node.activate();
      this.logger.debug(
        { level: target, key: node.label, cached, items: menu.items.length },
        "menu opened",
      );
      this.apply({ type: "menu-opened", menu });
    } catch (error) {
      if (error instanceof InvariantError) throw error;
      this.logger.error({ err: error, level: target, key: node.label }, "menu activation failed");
      this.apply({ type: "activation-failed", target, message: describeError(error) });
    }
  }

  private apply(action: BrowserAction): void {
    const next = reduceBrowserState(this.state, action);
    if (next === this.state) return;
    this.state = next;
    for (const listener of this.listeners) listener(next);
  }
}
