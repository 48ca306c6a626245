/**
 * @module permission-renderers
 * Unix and descriptive renderings of classified permission bits
 *
 * Both renderers walk the same principal listing (owner, group, other) and
 * differ only in the final template.
 *
 * @public
 */

import type { FileType, PermissionBits, PermissionTriplet } from "./mode-classifier.js";
import { type PermissionStyle, readPermissionStyle } from "./schemas.js";

/**
 * Renders classified permission bits as text
 *
 * @public
 */
export interface PermissionRenderer {
  render(bits: PermissionBits): string;
}

/**
 * A subject the permission bits apply to
 *
 * @public
 */
export type Principal = "owner" | "group" | "other";

/**
 * One principal's rights with any special bit that overrides its execute slot
 *
 * @public
 */
export interface PrincipalPermissions {
  readonly principal: Principal;
  readonly triplet: PermissionTriplet;

  /**
   * Setuid for the owner, setgid for the group, sticky for other
   */
  readonly special: boolean;
}

/**
 * List the principals in owner, group, other order
 *
 * @public
 */
export function listPrincipals(bits: PermissionBits): readonly PrincipalPermissions[] {
  return [
    { principal: "owner", triplet: bits.owner, special: bits.special.setuid },
    { principal: "group", triplet: bits.group, special: bits.special.setgid },
    { principal: "other", triplet: bits.other, special: bits.special.sticky },
  ];
}

const FILE_TYPE_TAGS: Readonly<Record<FileType, string>> = {
  regular: "-",
  directory: "d",
  symlink: "l",
  "block-device": "b",
  "character-device": "c",
  fifo: "p",
  socket: "s",
  unknown: "?",
};

/**
 * `ls -l` style rendering, e.g. "drwxr-xr-x"
 *
 * Setuid and setgid show as `s` (`S` without execute) in the owner and group
 * execute slots; the sticky bit shows as `t` (`T`) in the other slot.
 *
 * @public
 */
export class UnixPermissionRenderer implements PermissionRenderer {
  render(bits: PermissionBits): string {
    const groups = listPrincipals(bits).map(({ principal, triplet, special }) => {
      const read = triplet.read ? "r" : "-";
      const write = triplet.write ? "w" : "-";
      return `${read}${write}${executeSlot(principal, triplet.execute, special)}`;
    });
    return `${FILE_TYPE_TAGS[bits.fileType]}${groups.join("")}`;
  }
}

function executeSlot(principal: Principal, execute: boolean, special: boolean): string {
  if (!special) {
    return execute ? "x" : "-";
  }
  const marker = principal === "other" ? "t" : "s";
  return execute ? marker : marker.toUpperCase();
}

const PRINCIPAL_LABELS: Readonly<Record<Principal, string>> = {
  owner: "User",
  group: "Group",
  other: "Other",
};

/**
 * Sentence rendering for platforms without Unix modes
 *
 * @example
 * ```typescript
 * new DescriptivePermissionRenderer().render(bits);
 * // "User: Read, Write, Execute; Group: Read, Execute; Other: None"
 * ```
 *
 * @public
 */
export class DescriptivePermissionRenderer implements PermissionRenderer {
  render(bits: PermissionBits): string {
    return listPrincipals(bits)
      .map(
        ({ principal, triplet }) => `${PRINCIPAL_LABELS[principal]}: ${describeRights(triplet)}`,
      )
      .join("; ");
  }
}

function describeRights(triplet: PermissionTriplet): string {
  const rights = [
    triplet.read ? "Read" : undefined,
    triplet.write ? "Write" : undefined,
    triplet.execute ? "Execute" : undefined,
  ].filter((right): right is string => right !== undefined);

  return rights.length > 0 ? rights.join(", ") : "None";
}

const RENDERERS: Readonly<Record<PermissionStyle, PermissionRenderer>> = {
  unix: new UnixPermissionRenderer(),
  descriptive: new DescriptivePermissionRenderer(),
};

/**
 * Renderer for a style
 *
 * @public
 */
export function rendererFor(style: PermissionStyle): PermissionRenderer {
  return RENDERERS[style];
}

/**
 * Inputs to permission style resolution
 *
 * @public
 */
export interface PermissionStyleSource {
  /**
   * Explicit style, wins over everything else
   */
  style?: PermissionStyle;

  /**
   * Environment holding `HUMAN_UNITS_PERMISSION_STYLE` (defaults to process.env)
   */
  environment?: Record<string, string | undefined>;

  /**
   * Platform to render for (defaults to process.platform)
   */
  platform?: NodeJS.Platform;
}

/**
 * Decide how permissions are rendered
 *
 * An explicit style wins, then the environment override, then the platform:
 * Windows gets the descriptive rendering, everything else the Unix one.
 *
 * @throws {@link ConfigurationError} When the environment override is invalid
 *
 * @public
 */
export function resolvePermissionStyle(source: PermissionStyleSource = {}): PermissionStyle {
  if (source.style) {
    return source.style;
  }

  const configured = readPermissionStyle(source.environment ?? process.env);
  if (configured) {
    return configured;
  }

  return (source.platform ?? process.platform) === "win32" ? "descriptive" : "unix";
}
