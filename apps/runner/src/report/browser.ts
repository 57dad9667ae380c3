import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { pathToFileURL } from "node:url";
import { log, logWarning } from "../logger.js";

const execFileAsync = promisify(execFile);

export interface OpenCommand {
  command: string;
  args: string[];
}

/**
 * Default-browser opener for the current platform. The target is passed as
 * an argument, never through a shell string.
 */
export function openCommand(target: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  if (platform === "darwin") {
    return { command: "open", args: [target] };
  } else if (platform === "win32") {
    // `start` is a cmd builtin; the empty string is its window title
    return { command: "cmd", args: ["/c", "start", "", target] };
  }
  // Linux and the rest
  return { command: "xdg-open", args: [target] };
}

/**
 * Open a local file in the default browser. Resolves to false (and logs a
 * warning) when no opener is available, e.g. on a headless CI box.
 */
export async function openInBrowser(filePath: string): Promise<boolean> {
  const url = pathToFileURL(filePath).href;
  const { command, args } = openCommand(url);
  try {
    await execFileAsync(command, args);
    log.report.info({ url }, "opened in browser");
    return true;
  } catch (error) {
    logWarning("report", "could not open browser", {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
