/**
 * @file src/types/photo.ts
 * @summary Photo record and classification status types. A record is owned by the
 * record store; the engine only ever holds read-only copies.
 *
 * @exports
 *   - PhotoStatus - union of every status a record can carry
 *   - ClassifiedStatus - the three statuses a user can assign
 *   - PhotoRecord - a single classifiable photo
 */

export type PhotoStatus = "unsorted" | "keep" | "trash" | "maybe";

export type ClassifiedStatus = Exclude<PhotoStatus, "unsorted">;

export type PhotoRecord = {
  id: string;
  /** Album the photo lives in. */
  bucketId: string;
  /** Capture time in epoch ms; the date sort key. */
  takenAt: number;
  status: PhotoStatus;
  displayName?: string | null;
};
