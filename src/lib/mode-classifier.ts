/**
 * @module mode-classifier
 * Classification of raw file modes into permission bits
 *
 * The permission formatter depends only on the {@link ModeClassifier}
 * contract; {@link PosixModeClassifier} is the default implementation and
 * reads the POSIX `st_mode` layout (file type in the top bits, then
 * setuid/setgid/sticky, then owner/group/other rwx).
 *
 * @public
 */

/**
 * File type carried in the mode
 *
 * @public
 */
export type FileType =
  | "regular"
  | "directory"
  | "symlink"
  | "block-device"
  | "character-device"
  | "fifo"
  | "socket"
  | "unknown";

/**
 * Read, write and execute bits for one principal
 *
 * @public
 */
export interface PermissionTriplet {
  readonly read: boolean;
  readonly write: boolean;
  readonly execute: boolean;
}

/**
 * Setuid, setgid and sticky bits
 *
 * @public
 */
export interface SpecialBits {
  readonly setuid: boolean;
  readonly setgid: boolean;
  readonly sticky: boolean;
}

/**
 * A classified file mode
 *
 * @public
 */
export interface PermissionBits {
  readonly fileType: FileType;
  readonly owner: PermissionTriplet;
  readonly group: PermissionTriplet;
  readonly other: PermissionTriplet;
  readonly special: SpecialBits;
}

/**
 * Maps a raw mode integer to its permission bits
 *
 * @public
 */
export interface ModeClassifier {
  classify(mode: number): PermissionBits;
}

const FILE_TYPE_MASK = 0o170_000;

const FILE_TYPES: ReadonlyMap<number, FileType> = new Map<number, FileType>([
  [0o140_000, "socket"],
  [0o120_000, "symlink"],
  [0o100_000, "regular"],
  [0o060_000, "block-device"],
  [0o040_000, "directory"],
  [0o020_000, "character-device"],
  [0o010_000, "fifo"],
]);

const SETUID = 0o4000;
const SETGID = 0o2000;
const STICKY = 0o1000;

/**
 * Classifier for POSIX `st_mode` values, as found on `fs.Stats#mode`
 *
 * @example
 * ```typescript
 * const bits = new PosixModeClassifier().classify(0o40755);
 * bits.fileType;      // "directory"
 * bits.group.write;   // false
 * ```
 *
 * @public
 */
export class PosixModeClassifier implements ModeClassifier {
  classify(mode: number): PermissionBits {
    return {
      fileType: FILE_TYPES.get(mode & FILE_TYPE_MASK) ?? "unknown",
      owner: triplet(mode, 6),
      group: triplet(mode, 3),
      other: triplet(mode, 0),
      special: {
        setuid: (mode & SETUID) !== 0,
        setgid: (mode & SETGID) !== 0,
        sticky: (mode & STICKY) !== 0,
      },
    };
  }
}

function triplet(mode: number, shift: number): PermissionTriplet {
  const bits = (mode >>> shift) & 0o7;
  return {
    read: (bits & 0o4) !== 0,
    write: (bits & 0o2) !== 0,
    execute: (bits & 0o1) !== 0,
  };
}

/**
 * Shared default classifier
 *
 * @public
 */
export const posixModeClassifier: ModeClassifier = new PosixModeClassifier();
