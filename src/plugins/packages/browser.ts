import { pathToFileURL } from "url";

import type { AnalysisPackage, OptionsMap } from "../../core/types.js";
import { PackageError } from "../../lib/errors.js";
import { runCommand } from "../process.js";

const DEFAULT_BROWSER = "xdg-open";

/**
 * Opens a URL (or a local HTML file) in the guest's browser.
 * The browser outlives the launcher, so the analysis runs until timeout.
 *
 * Options: `browser=<command>` replaces the opener.
 */
export class BrowserPackage implements AnalysisPackage {
  constructor(private readonly options: OptionsMap = {}) {}

  get browser(): string {
    return this.options["browser"] ?? DEFAULT_BROWSER;
  }

  async start(target: string): Promise<boolean> {
    const url = /^[a-z][a-z0-9+.-]*:\/\//i.test(target) ? target : pathToFileURL(target).href;
    const result = await runCommand(this.browser, [url], { timeout: 15000 });
    if (result.exitCode !== 0) {
      throw new PackageError(`${this.browser} exited with code ${result.exitCode}: ${result.stderr.trim()}`, {
        url,
        timedOut: result.timedOut,
      });
    }
    return true;
  }

  check(): boolean {
    return true;
  }
}
