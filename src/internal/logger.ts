type Severity = "info" | "warning" | "error";

export type WarningType =
  | "Manifest entry replaced by a different definition"
  | "Atomic class emitted with different declarations (hash collision)"
  | "Stylesheet placeholder `@import \"atomcss\";` not found, appending generated CSS"
  | "Definitions module registered no styles"
  | "Unknown CSS property"
  | "Unnecessary vendor prefix"
  | "Deprecated CSS property";

export interface WarningLog {
  severity: Severity;
  type: WarningType;
  /** Manifest key or file the warning is about */
  source: string | null;
  context?: Record<string, unknown>;
}

// ────────────────────────────────────────────────────────────────────────────
// Logger
// ────────────────────────────────────────────────────────────────────────────

export class Logger {
  public static info(message: string): void {
    Logger.writeWithSpacing(`${Logger.colorizeSeverityLabel("info")} ${message}`);
  }

  /**
   * Log an error message to stdout, prefixed with where it happened.
   */
  public static logError(message: string, source: string, context?: unknown): void {
    const label = Logger.colorizeSeverityLabel("error");
    Logger.writeWithSpacing(`${label} ${source}\n${message}`, context);
  }

  /**
   * Log compiler warnings to stdout and collect them for the summary report.
   */
  public static logWarnings(warnings: WarningLog[]): void {
    for (const warning of warnings) {
      Logger.collected.push(warning);
      const label = Logger.colorizeSeverityLabel(warning.severity);
      const header = warning.source ? `${label} ${warning.source}` : label;
      Logger.writeWithSpacing(`${header}\n${warning.type}`, warning.context);
    }
  }

  public static createReport(): LoggerReport {
    return new LoggerReport([...Logger.collected]);
  }

  /** @internal - for testing only */
  public static _clearCollected(): void {
    Logger.collected = [];
  }

  // -- Internal state

  private static collected: WarningLog[] = [];

  private static writeWithSpacing(message: string, context?: unknown): void {
    const trimmed = message.replace(/\s+$/u, "");
    const serialized = context === undefined ? null : JSON.stringify(context, null, 2);
    process.stdout.write(`${trimmed}${serialized ? `\n${serialized}` : ""}\n\n`);
  }

  private static colorizeSeverityLabel(severity: Severity): string {
    const [label, colors] = SEVERITY_STYLES[severity];
    if (!process.stdout.isTTY) {
      return label;
    }
    return `${colors}${label}${RESET_COLOR}`;
  }
}

// ────────────────────────────────────────────────────────────────────────────
// LoggerReport - grouped summary of collected warnings
// ────────────────────────────────────────────────────────────────────────────

interface WarningGroup {
  message: WarningType;
  warnings: WarningLog[];
}

const MAX_EXAMPLES = 10;

export class LoggerReport {
  private readonly warnings: WarningLog[];

  constructor(warnings: WarningLog[]) {
    this.warnings = warnings;
  }

  getWarnings(): WarningLog[] {
    return this.warnings;
  }

  toString(): string {
    if (this.warnings.length === 0) {
      return "";
    }

    const groups = this.groupWarnings();
    const lines: string[] = [
      "",
      "─".repeat(60),
      `Warning Summary: ${this.warnings.length} warning(s) in ${groups.length} category(s)`,
      "─".repeat(60),
    ];

    for (const group of groups) {
      lines.push("", `▸ ${group.message} (${group.warnings.length})`, "");

      const sources = [...new Set(group.warnings.map((warning) => warning.source ?? "(build)"))];
      for (const source of sources.slice(0, MAX_EXAMPLES)) {
        lines.push(`  ${source}`);
      }
      const remaining = sources.length - MAX_EXAMPLES;
      if (remaining > 0) {
        lines.push(`  ... and ${remaining} more`);
      }
    }

    return lines.join("\n");
  }

  print(): void {
    const output = this.toString();
    if (!output) {
      return;
    }
    const colored = process.stdout.isTTY
      ? output.replace(/▸ (.+?) \((\d+)\)/g, `${SECTION_COLOR}▸ $1 ($2)${RESET_COLOR}`)
      : output;
    process.stdout.write(colored + "\n");
  }

  private groupWarnings(): WarningGroup[] {
    const groupMap = new Map<WarningType, WarningGroup>();
    for (const warning of this.warnings) {
      const existing = groupMap.get(warning.type);
      if (existing) {
        existing.warnings.push(warning);
      } else {
        groupMap.set(warning.type, { message: warning.type, warnings: [warning] });
      }
    }
    // Most frequent first; ties keep first-seen order (stable sort)
    return [...groupMap.values()].sort((a, b) => b.warnings.length - a.warnings.length);
  }
}

const RESET_COLOR = "\u001b[0m";
const SECTION_COLOR = "\u001b[36m";

const SEVERITY_STYLES: Record<Severity, readonly [label: string, colors: string]> = {
  error: ["Error", "\u001b[41m\u001b[37m"],
  warning: ["Warning", "\u001b[43m\u001b[30m"],
  info: ["Info", "\u001b[44m\u001b[37m"],
};
