import path from 'path';

/**
 * Depot path handling.
 *
 * Stored paths carry the `$DEPOT_ALL` token instead of the machine-specific
 * depot root so the databases can be shared between workstations.
 */

export const DEPOT_TOKEN = '$DEPOT_ALL';

export interface PathResolver {
  readonly depotRoot: string;
  /** Replace a leading `$DEPOT_ALL` with the depot root. */
  expand(storedPath: string): string;
  /** Replace a leading depot root with `$DEPOT_ALL`. */
  toSymbolic(absolutePath: string): string;
  /** Path of `target` relative to `base`, with forward slashes. */
  toRelative(target: string, base: string): string;
  /** Path relative to the depot root, for URLs under the static route. */
  depotRelative(storedOrAbsolute: string): string;
}

export function hasDepotToken(storedPath: string): boolean {
  return storedPath === DEPOT_TOKEN || storedPath.startsWith(`${DEPOT_TOKEN}/`);
}

export function createPathResolver(depotRoot: string): PathResolver {
  if (!depotRoot) {
    throw new Error('Depot root is not configured');
  }
  const root = stripTrailingSeparator(path.resolve(depotRoot));

  const expand = (storedPath: string): string => {
    if (!hasDepotToken(storedPath)) return storedPath;
    return root + storedPath.slice(DEPOT_TOKEN.length);
  };

  const toSymbolic = (absolutePath: string): string => {
    if (absolutePath === root) return DEPOT_TOKEN;
    if (absolutePath.startsWith(`${root}/`)) {
      return DEPOT_TOKEN + absolutePath.slice(root.length);
    }
    return absolutePath;
  };

  const toRelative = (target: string, base: string): string =>
    toPosix(path.relative(base, expand(target)));

  return {
    depotRoot: root,
    expand,
    toSymbolic,
    toRelative,
    depotRelative: storedOrAbsolute => toRelative(storedOrAbsolute, root),
  };
}

function stripTrailingSeparator(value: string): string {
  return value.length > 1 && value.endsWith(path.sep) ? value.slice(0, -1) : value;
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}
