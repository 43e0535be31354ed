// Seismic Relocator - Mailbox queue
// A spool directory of symbolic links, each pointing at a pick payload under
// <eventRoot>/<eventID>/in/. Links are owned by the queue until acknowledged;
// removing a link marks its item as permanently done.

import { lstat, mkdir, readdir, readlink, stat, unlink } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MailboxEntry, MailboxOrder } from "./types.js";

export const PAYLOAD_EXTENSION = ".json";

/** Directory holding incoming payloads inside an event directory. */
export const INCOMING_DIR = "in";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Event ID encoded in a payload path of the form .../<eventID>/in/<name>,
 * or null when the path does not follow that layout.
 */
export function eventIDFromTarget(targetPath: string): string | null {
  const parent = dirname(targetPath);
  if (basename(parent) !== INCOMING_DIR) return null;
  const eventID = basename(dirname(parent));
  return eventID.length > 0 && eventID !== "." && eventID !== "/" ? eventID : null;
}

export interface MailboxQueueOptions {
  order: MailboxOrder;
}

export class MailboxQueue {
  readonly spoolDir: string;
  private readonly order: MailboxOrder;
  private readonly logger: Logger;

  constructor(spoolDir: string, options: MailboxQueueOptions, logger: Logger) {
    this.spoolDir = spoolDir;
    this.order = options.order;
    this.logger = logger;
  }

  /** In prioritize-recent mode a wake handles one item, then re-lists. */
  get stopsAfterOneItem(): boolean {
    return this.order === "prioritize-recent";
  }

  async ensure(): Promise<void> {
    await mkdir(this.spoolDir, { recursive: true });
  }

  /**
   * Ready entries in processing order. Links whose payload is missing are
   * left in place for a later pass.
   */
  async list(): Promise<MailboxEntry[]> {
    const names = (await readdir(this.spoolDir)).filter((name) => name.endsWith(PAYLOAD_EXTENSION)).sort();
    const entries: MailboxEntry[] = [];

    for (const name of names) {
      const linkPath = join(this.spoolDir, name);
      const entry = await this.resolveEntry(name, linkPath);
      if (entry) entries.push(entry);
    }

    if (this.order === "prioritize-recent") entries.reverse();
    return entries;
  }

  /** Removes the entry's link. A link that is already gone is not an error. */
  async acknowledge(entry: MailboxEntry): Promise<void> {
    try {
      await unlink(entry.linkPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.logger.debug(`link ${entry.linkPath} already removed`);
        return;
      }
      throw err;
    }
  }

  private async resolveEntry(name: string, linkPath: string): Promise<MailboxEntry | null> {
    try {
      const info = await lstat(linkPath);
      if (!info.isSymbolicLink()) return null;

      const targetPath = resolve(this.spoolDir, await readlink(linkPath));
      try {
        await stat(targetPath);
      } catch {
        this.logger.warn(`missing ${targetPath}`);
        return null;
      }

      const eventID = eventIDFromTarget(targetPath);
      if (!eventID) {
        this.logger.warn(`${linkPath} -> ${targetPath} is not inside an event "${INCOMING_DIR}" directory`);
        return null;
      }
      return { name, linkPath, targetPath, eventID };
    } catch (err) {
      // the link vanished between readdir and lstat
      this.logger.debug(`skipping ${linkPath}: ${errorMessage(err)}`);
      return null;
    }
  }
}
