// Seismic Relocator - Result Publisher
// Writes derived picks under the event's "out" directory, links them into the
// outgoing mailbox for the next consumer, then retires the incoming link.

import { mkdir, symlink, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";
import type { AssociatedAnnotation } from "./annotation-associator.js";
import type { Logger } from "./logger.js";
import type { MailboxQueue } from "./mailbox.js";
import { writePickPayload } from "./pick-payload.js";
import type { MailboxEntry, PickRecord } from "./types.js";

export const OUTGOING_DIR = "out";

export interface ResultPublisherOptions {
  eventRootDir: string;
  outgoingDir: string;
  annotDir: string;
}

export interface PublishedResult {
  payloadPath: string;
  linkPath: string;
  /** false when the outgoing link already existed */
  linkCreated: boolean;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class ResultPublisher {
  private readonly options: ResultPublisherOptions;
  private readonly queue: MailboxQueue;
  private readonly logger: Logger;

  constructor(options: ResultPublisherOptions, queue: MailboxQueue, logger: Logger) {
    this.options = options;
    this.queue = queue;
    this.logger = logger;
  }

  async publish(entry: MailboxEntry, picks: PickRecord[]): Promise<PublishedResult> {
    const payloadPath = join(this.options.eventRootDir, entry.eventID, OUTGOING_DIR, entry.name);
    await writePickPayload(payloadPath, picks);

    await mkdir(this.options.outgoingDir, { recursive: true });
    const linkPath = join(this.options.outgoingDir, entry.name);
    const target = relative(this.options.outgoingDir, payloadPath);

    let linkCreated = true;
    try {
      this.logger.debug(`creating symlink ${linkPath} -> ${target}`);
      await symlink(target, linkPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      this.logger.warn(`symlink ${linkPath} -> ${target} already exists`);
      linkCreated = false;
    }

    await this.queue.acknowledge(entry);
    return { payloadPath, linkPath, linkCreated };
  }

  /** Stores each associated curve as <annotDir>/<NET.STA.LOC.CHA>.json inside the event directory. */
  async writeAnnotations(eventID: string, pairs: readonly AssociatedAnnotation[]): Promise<void> {
    if (pairs.length === 0) return;
    const dir = join(this.options.eventRootDir, eventID, this.options.annotDir);
    await mkdir(dir, { recursive: true });
    for (const { pick, annotation } of pairs) {
      const nslc = `${pick.networkCode}.${pick.stationCode}.${pick.locationCode}.${pick.channelCode}`;
      const document = {
        pickID: pick.publicID,
        channel: annotation.channel,
        startTime: new Date(annotation.startTime).toISOString(),
        samplingRate: annotation.samplingRate,
        data: annotation.data,
      };
      await writeFile(join(dir, `${nslc}.json`), JSON.stringify(document) + "\n", "utf-8");
    }
  }
}
