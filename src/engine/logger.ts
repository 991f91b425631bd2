type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const STREAM_COLORS = [COLORS.blue, COLORS.cyan, COLORS.magenta, COLORS.green, COLORS.yellow];

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

// stdout belongs to the message stream, so every log line goes to stderr
const write = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

const streamColor = (name: string): string => {
  let hash = 0;
  for (const char of name) {
    hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
  }
  return STREAM_COLORS[hash % STREAM_COLORS.length];
};

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const log = {
  info: (message: string) => {
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  stream: (name: string, message: string) => {
    const tag = `${streamColor(name)}${name}${COLORS.reset}`;
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${message}`);
  },

  runningTotal: (stats: { read: number; written: number; checkpoints: number }) => {
    const parts: string[] = [
      `read ${COLORS.bold}${formatNumber(stats.read)}${COLORS.reset}`,
      `written ${COLORS.green}${formatNumber(stats.written)}${COLORS.reset}`,
    ];

    if (stats.checkpoints > 0) {
      parts.push(`checkpoints ${COLORS.cyan}${formatNumber(stats.checkpoints)}${COLORS.reset}`);
    }
    write(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.dim}total${COLORS.reset}  ${parts.join('  ')}`);
  },

  sync: {
    start: (config: { name: string; batchSize: number; streams: string[]; resuming: boolean }) => {
      const resuming = config.resuming ? `${COLORS.yellow}yes${COLORS.reset}` : 'no';
      const lines = [
        '',
        `${COLORS.bold}Sync "${config.name}" started${COLORS.reset}`,
        `  batch size: ${formatNumber(config.batchSize)}`,
        `  streams:    ${config.streams.join(', ')}`,
        `  resuming:   ${resuming}`,
        '',
      ];
      write(lines.join('\n'));
    },

    summary: (stats: { read: number; written: number; checkpoints: number; completed: boolean; elapsed: number }) => {
      const status = stats.completed
        ? `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`
        : `${COLORS.yellow}${COLORS.bold}INCOMPLETE${COLORS.reset}`;

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}`,
        '',
        `  read:        ${COLORS.bold}${formatNumber(stats.read)}${COLORS.reset}`,
        `  written:     ${COLORS.green}${formatNumber(stats.written)}${COLORS.reset}`,
        `  checkpoints: ${COLORS.cyan}${formatNumber(stats.checkpoints)}${COLORS.reset}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      write(lines.join('\n'));
    },
  },

  db: (action: string, count: number, elapsed: number) => {
    const tag = `${COLORS.dim}db${COLORS.reset}`;
    const time =
      elapsed > 1000 ? `${COLORS.yellow}${elapsed}ms${COLORS.reset}` : `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    write(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}     ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } rows  ${time}`
    );
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  constraint?: string;
  table?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

export const formatDbError = (err: unknown): string => {
  if (!isPgError(err)) {
    const msg = err instanceof Error ? err.message : String(err);
    return msg.split('\n')[0].slice(0, 200);
  }

  const fields: Array<[string, string | undefined]> = [
    ['code', err.code],
    ['severity', err.severity],
    ['detail', err.detail],
    ['constraint', err.constraint],
    ['table', err.table],
    ['hint', err.hint],
  ];

  const padding = '                      ';
  return fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${padding}${COLORS.dim}${k.padEnd(12)}${COLORS.reset}${v}`)
    .join('\n');
};
