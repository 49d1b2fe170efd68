import { shellJoin } from '../utils/shell-escape';

export interface GhostscriptSettings {
  device: string;
  compatibilityLevel: string;
  pdfSettings: string;
  autoRotatePages: string;
  downsampleType: string;
  colorImageResolution: number;   // dpi
  grayImageResolution: number;    // dpi
  monoImageResolution: number;    // dpi
}

/**
 * Tuned for scanned documents: /ebook preset with images resampled to 135 dpi
 */
export const GHOSTSCRIPT_SETTINGS: Readonly<GhostscriptSettings> = Object.freeze({
  device: 'pdfwrite',
  compatibilityLevel: '1.4',
  pdfSettings: '/ebook',
  autoRotatePages: '/None',
  downsampleType: '/Bicubic',
  colorImageResolution: 135,
  grayImageResolution: 135,
  monoImageResolution: 135,
});

export interface ShrinkCommand {
  program: string;
  args: string[];
  settings: Readonly<GhostscriptSettings>;
}

/**
 * Ghostscript invocation that shrinks `input` and writes to `output`
 */
export function buildShrinkCommand(
  input: string,
  output: string,
  program: string = 'gs'
): ShrinkCommand {
  const s = GHOSTSCRIPT_SETTINGS;

  const args = [
    '-q',
    '-dBATCH',
    '-dSAFER',
    '-dNOPAUSE',
    `-sDEVICE=${s.device}`,
    `-dCompatibilityLevel=${s.compatibilityLevel}`,
    `-dPDFSETTINGS=${s.pdfSettings}`,
    `-dAutoRotatePages=${s.autoRotatePages}`,
    `-dColorImageDownsampleType=${s.downsampleType}`,
    `-dColorImageResolution=${s.colorImageResolution}`,
    `-dGrayImageDownsampleType=${s.downsampleType}`,
    `-dGrayImageResolution=${s.grayImageResolution}`,
    `-dMonoImageDownsampleType=${s.downsampleType}`,
    `-dMonoImageResolution=${s.monoImageResolution}`,
    `-sOutputFile=${escapeOutputFile(output)}`,
    input,
  ];

  return { program, args, settings: s };
}

/**
 * gs reads -sOutputFile as a template where %d is the page number; %% is a literal %
 */
export function escapeOutputFile(filePath: string): string {
  return filePath.replace(/%/g, '%%');
}

/**
 * Shell-escaped command line, for display only
 */
export function formatCommandLine(command: ShrinkCommand): string {
  return shellJoin([command.program, ...command.args]);
}
