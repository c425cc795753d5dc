/**
 * Amendment Log
 *
 * Keeps the latest successful update per item id. Earlier amendments are
 * overwritten, not archived.
 */

import { AmendmentRecord, Identity } from './registry-types';

export class AmendmentLog {
  private amendments: Map<number, AmendmentRecord> = new Map();

  constructor(initial?: Iterable<[number, AmendmentRecord]>) {
    if (initial) {
      for (const [id, record] of initial) {
        this.amendments.set(id, { ...record });
      }
    }
  }

  recordAmendment(
    id: number,
    change: { metadata: string; expiry: number; location: string },
    height: number,
    updater: Identity
  ): AmendmentRecord {
    const record: AmendmentRecord = {
      updatedMetadata: change.metadata,
      updatedExpiry: change.expiry,
      updatedLocation: change.location,
      updateTimestamp: height,
      updater,
    };
    this.amendments.set(id, record);
    return { ...record };
  }

  getAmendment(id: number): AmendmentRecord | undefined {
    const record = this.amendments.get(id);
    return record ? { ...record } : undefined;
  }

  get size(): number {
    return this.amendments.size;
  }

  entries(): Array<[number, AmendmentRecord]> {
    return Array.from(this.amendments, ([id, record]): [number, AmendmentRecord] => [id, { ...record }]);
  }
}
