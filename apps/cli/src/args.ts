export const USAGE = [
  'Usage: pagescribe [input.pdf] [output.md] [start_page] [end_page]',
  '   or: pagescribe [start_page] [end_page] < input.pdf',
].join('\n');

export interface CliArgs {
  help: boolean;
  /** Input document; standard input when absent */
  inputPath?: string;
  /** Markdown destination; standard output when absent */
  outputPath?: string;
  startPage?: string;
  endPage?: string;
}

/**
 * Split positional arguments into paths and page numbers.
 *
 * The first argument is an input path when it names an existing file or ends
 * in `.pdf`; otherwise every argument is a page number. After an input path,
 * an argument ending in `.md` is the output path. Page numbers are returned
 * as typed and parsed later.
 */
export function parseArgs(
  argv: readonly string[],
  isFile: (path: string) => boolean,
): CliArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { help: true };
  }

  const [first, second, third, fourth] = argv;

  if (first === undefined) {
    return { help: false };
  }

  if (!isFile(first) && !first.toLowerCase().endsWith('.pdf')) {
    return { help: false, startPage: first, endPage: second };
  }

  if (second !== undefined && second.toLowerCase().endsWith('.md')) {
    return {
      help: false,
      inputPath: first,
      outputPath: second,
      startPage: third,
      endPage: fourth,
    };
  }

  return { help: false, inputPath: first, startPage: second, endPage: third };
}
