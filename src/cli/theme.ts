/**
 * Recall CLI theme: colors, icons and small formatters shared by commands.
 */

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
};

export const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,
  italic: (text: string) => `${colors.italic}${text}${colors.reset}`,

  success: (text: string) => `${colors.green}${text}${colors.reset}`,
  error: (text: string) => `${colors.red}${text}${colors.reset}`,
  warning: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  info: (text: string) => `${colors.cyan}${text}${colors.reset}`,
  highlight: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,
  muted: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,

  primary: (text: string) => `${colors.brightGreen}${text}${colors.reset}`,
  accent: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,

  command: (text: string) => `${colors.bold}${colors.cyan}${text}${colors.reset}`,
  path: (text: string) => `${colors.brightBlue}${text}${colors.reset}`,
  number: (text: string) => `${colors.brightYellow}${text}${colors.reset}`,
  label: (text: string) => `${colors.dim}${text}${colors.reset}`,
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  pending: '○',
  running: '◐',

  arrowRight: '▸',
  bullet: '•',

  file: '📄',
  question: '❓',
  brain: '🧠',
  sparkle: '✨',

  passed: '✅',
  failed: '❌',
};

export const box = {
  horizontal: '─',
  vertical: '│',
  dHorizontal: '═',
};

export const BANNER = `
${style.primary('  ╔═══════════════════════════════════════════════════════╗')}
${style.primary('  ║')}  ${style.bold(style.accent('recall'))}${style.muted(' · quiz yourself on your own notes')}            ${style.primary('║')}
${style.primary('  ╚═══════════════════════════════════════════════════════╝')}
`;

export const BANNER_MINIMAL = `${style.accent('recall')} ${style.muted('·')} ${style.dim('quiz yourself on your own notes')}`;

export function header(title: string): string {
  const width = 60;
  return `\n${style.primary(box.dHorizontal.repeat(width))}
${style.bold(title)}
${style.primary(box.dHorizontal.repeat(width))}\n`;
}

export function subheader(title: string): string {
  return `\n${style.bold(title)}\n${style.dim(box.horizontal.repeat(40))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

export function bullet(text: string, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.dim(icons.bullet)} ${text}`;
}

export function step(text: string, status: 'running' | 'done' | 'error'): string {
  const statusIcon = {
    running: style.info(icons.running),
    done: style.success(icons.success),
    error: style.error(icons.error),
  }[status];

  return `  ${statusIcon} ${status === 'done' ? style.muted(text) : text}`;
}

/** Prefix every line of a block, for quoting model output under a label. */
export function indentBlock(text: string, prefix = `  ${style.primary(box.vertical)} `): string {
  return text
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n');
}

export class Spinner {
  private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private frameIndex = 0;
  private intervalId: NodeJS.Timeout | null = null;
  private text: string;

  constructor(text: string) {
    this.text = text;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    process.stdout.write('\x1b[?25l');
    this.render();
    this.intervalId = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % this.frames.length;
      this.render();
    }, 80);
  }

  private render(): void {
    process.stdout.write(`\r\x1b[2K${style.info(this.frames[this.frameIndex])} ${this.text}`);
  }

  update(text: string): void {
    this.text = text;
    if (this.running) {
      this.render();
    }
  }

  succeed(text?: string): void {
    this.stop();
    console.log(`${style.success(icons.success)} ${text || this.text}`);
  }

  fail(text?: string): void {
    this.stop();
    console.log(`${style.error(icons.error)} ${text || this.text}`);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\r\x1b[2K');
  }
}

export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function welcomeMessage(): string {
  return `
${BANNER}

${style.bold('Welcome to recall!')} ${icons.sparkle}

Pick a random note, get asked one question about it, answer, and get graded.

${style.bold('Quick Start:')}

  ${style.command('recall quiz')}                    ${style.dim('Start a quiz with the default provider')}
  ${style.command('recall quiz --provider openai')}  ${style.dim('Grade with OpenAI instead of Ollama')}
  ${style.command('recall check')}                   ${style.dim('Verify Ollama, the model and your notes')}
  ${style.command('recall models')}                  ${style.dim('List models installed in Ollama')}

${style.bold('Configuration')} ${style.dim('(.env or environment)')}:

  ${style.label('DEFAULT_PROVIDER')}  ollama | openai
  ${style.label('MODEL_NAME')}        local model, e.g. gemma2:2b
  ${style.label('OPENAI_API_KEY')}    required for openai
  ${style.label('ARTICLES_DIR')}      folder of .md notes
`;
}
