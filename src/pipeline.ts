/**
 * Line pipeline: header → layout, then decode → filter → dispatch per line.
 */

import type { RunConfig } from "./config.js";
import { NO_MATCHES_WARNING } from "./constants.js";
import { formatRow, RowDispatcher, type DispatchDeps } from "./dispatcher.js";
import { log } from "./logger.js";
import { createLayout, type Layout } from "./table/layout.js";
import { matches, validateMatchSpec } from "./table/match.js";

export class RowProcessor {
  private layout: Layout | null = null;
  private matched = 0;
  private readonly dispatcher: RowDispatcher;

  constructor(
    private readonly config: RunConfig,
    kind: string,
    private readonly deps: DispatchDeps
  ) {
    this.dispatcher = new RowDispatcher(config, kind, deps);
  }

  /**
   * Consume one line of `kubectl get` output. The first non-blank line is the
   * header; every later one is a data row.
   *
   * @throws LayoutError if the header has no columns.
   * @throws ValidationError if a filter addresses a missing column.
   * @throws CommandError when a fail-fast action fails.
   */
  async accept(line: string): Promise<void> {
    if (line.trim() === "") {
      return;
    }
    if (this.layout === null) {
      this.layout = this.readHeader(line);
      return;
    }

    const row = this.layout.decode(line);
    if (!matches(row, this.config.filters)) {
      return;
    }
    this.matched++;
    await this.dispatcher.dispatch(row, this.layout);
  }

  /**
   * Warn when nothing matched and return the run's exit code.
   */
  finish(): number {
    if (this.matched === 0) {
      log.warn(NO_MATCHES_WARNING);
    }
    return this.dispatcher.exitCode;
  }

  private readHeader(line: string): Layout {
    const layout = createLayout(line);
    validateMatchSpec(this.config.filters, layout.columns);
    log.debug(`Columns: ${layout.columns.map((c) => `${c.name}(${c.width})`).join(" ")}`);

    if (this.config.headers && this.config.action.kind === "get") {
      this.deps.output.line(formatRow(layout, layout.decode(line), this.config.preserveColumns));
    }
    return layout;
  }
}
