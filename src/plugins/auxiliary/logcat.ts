import { join } from "path";

import { CommandCapture } from "./capture.js";

/**
 * Captures the system log for the duration of the analysis
 */
export class LogcatCapture extends CommandCapture {
  constructor(resultsDir: string) {
    super({
      command: "logcat",
      args: ["-v", "time"],
      outputPath: join(resultsDir, "logs", "logcat.txt"),
    });
  }
}
