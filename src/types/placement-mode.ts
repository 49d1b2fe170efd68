export type PlacementMode =
  | { kind: 'inplace' }
  | { kind: 'rename'; suffix: string }
  | { kind: 'subdir'; dir: string };

export const DEFAULT_SUFFIX = 'shrunk';

export const DEFAULT_PLACEMENT_MODE: PlacementMode = { kind: 'rename', suffix: DEFAULT_SUFFIX };

export interface PlacementOptions {
  inplace?: boolean;
  rename?: boolean;
  subdir?: string;
}

/**
 * Collapse the --inplace / --rename / --subdir flags into a single mode.
 * Throws if more than one of them is set.
 */
export function placementModeFromOptions(options: PlacementOptions): PlacementMode {
  const selected = [
    options.inplace ? '--inplace' : null,
    options.rename ? '--rename' : null,
    options.subdir !== undefined ? '--subdir' : null,
  ].filter((flag): flag is string => flag !== null);

  if (selected.length > 1) {
    throw new Error(
      `Options ${selected.join(', ')} cannot be used together.\n\n` +
        `The options --inplace, --rename and --subdir are mutually exclusive.`
    );
  }

  if (options.inplace) {
    return { kind: 'inplace' };
  }
  if (options.subdir !== undefined) {
    return { kind: 'subdir', dir: options.subdir };
  }
  return DEFAULT_PLACEMENT_MODE;
}

/**
 * Human-readable description of a mode, used in debug output
 */
export function describePlacementMode(mode: PlacementMode): string {
  switch (mode.kind) {
    case 'inplace':
      return 'inplace';
    case 'rename':
      return `rename (*.pdf -> *.${mode.suffix}.pdf)`;
    case 'subdir':
      return `subdir = ${mode.dir}`;
  }
}
