import * as path from 'path';
import { PlacementMode } from '../types/placement-mode';
import { ResolutionError } from '../types/shrink-result';
import { ensureDir, isRegularFile, resolveRealPath } from '../utils/file-utils';

export interface ResolvedTarget {
  input: string;
  output: string;          // Where the shrunk file ends up
  engineOutput: string;    // Temp sibling of output that Ghostscript writes to
  createDir?: string;      // Directory to create before running (--subdir)
  keepMode?: boolean;      // Output takes over the input's permission bits (--inplace)
}

export type ResolveResult =
  | { ok: true; target: ResolvedTarget }
  | { ok: false; error: ResolutionError; output?: string };

export interface PrepareOptions {
  dryRun: boolean;
}

/**
 * Insert a tag before the extension of a file name
 * Example: ("scan.pdf", "shrunk") → "scan.shrunk.pdf", ("notes", "shrunk") → "notes.shrunk"
 */
export function withSuffix(filePath: string, suffix: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  const stem = base.slice(0, base.length - ext.length);
  const tag = suffix ? `.${suffix}` : '';
  return path.join(path.dirname(filePath), `${stem}${tag}${ext}`);
}

/**
 * Hidden sibling the engine writes to before the result is moved onto filePath
 * Example: "docs/scan.shrunk.pdf" → "docs/.scan.shrunk.pdf.tmp"
 */
export function tempOutputPath(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp`);
}

export class PathResolver {
  /**
   * Compute the destination for one input. Pure: never touches the filesystem.
   */
  resolve(input: string, mode: PlacementMode): ResolveResult {
    switch (mode.kind) {
      case 'inplace':
        return {
          ok: true,
          target: { input, output: input, engineOutput: tempOutputPath(input), keepMode: true },
        };

      case 'rename': {
        const output = withSuffix(input, mode.suffix);
        if (this.aliases(input, output)) {
          return this.collision(input, output);
        }
        return { ok: true, target: { input, output, engineOutput: tempOutputPath(output) } };
      }

      case 'subdir': {
        const output = path.join(mode.dir, path.basename(input));
        if (this.aliases(input, output)) {
          return this.collision(input, output);
        }
        return {
          ok: true,
          target: { input, output, engineOutput: tempOutputPath(output), createDir: mode.dir },
        };
      }
    }
  }

  /**
   * Resolve, then check the input and create the output directory.
   * Nothing is created on a dry run.
   */
  async prepare(input: string, mode: PlacementMode, options: PrepareOptions): Promise<ResolveResult> {
    const resolved = this.resolve(input, mode);
    if (!resolved.ok) {
      return resolved;
    }
    let { target } = resolved;

    if (!(await isRegularFile(input))) {
      return this.inputNotFound(input, target.output);
    }

    // Replace the file a symlink points at, not the link itself
    if (mode.kind === 'inplace') {
      let realInput: string;
      try {
        realInput = await resolveRealPath(input);
      } catch {
        return this.inputNotFound(input, target.output);
      }
      if (realInput !== path.resolve(input)) {
        target = { ...target, output: realInput, engineOutput: tempOutputPath(realInput) };
      }
    }

    if (target.createDir && !options.dryRun) {
      try {
        await ensureDir(target.createDir);
      } catch (error) {
        return {
          ok: false,
          output: target.output,
          error: {
            kind: 'directory-creation-failed',
            message: `Cannot create ${target.createDir}: ${(error as Error).message}`,
          },
        };
      }
    }

    return { ok: true, target };
  }

  private aliases(input: string, output: string): boolean {
    return path.resolve(input) === path.resolve(output);
  }

  private inputNotFound(input: string, output: string): ResolveResult {
    return {
      ok: false,
      output,
      error: { kind: 'input-not-found', message: `Input file not found: ${input}` },
    };
  }

  private collision(input: string, output: string): ResolveResult {
    return {
      ok: false,
      output,
      error: {
        kind: 'naming-collision',
        message: `Output path for ${input} would overwrite the input`,
      },
    };
  }
}

// Export singleton instance
export const pathResolver = new PathResolver();
