export enum Severity {
  DEFAULT = "DEFAULT",
  DEBUG = "DEBUG",
  INFO = "INFO",
  NOTICE = "NOTICE",
  WARNING = "WARNING",
  ERROR = "ERROR",
  CRITICAL = "CRITICAL",
  ALERT = "ALERT",
  EMERGENCY = "EMERGENCY",
}

const SEVERITY_ORDER: readonly Severity[] = [
  Severity.DEFAULT,
  Severity.DEBUG,
  Severity.INFO,
  Severity.NOTICE,
  Severity.WARNING,
  Severity.ERROR,
  Severity.CRITICAL,
  Severity.ALERT,
  Severity.EMERGENCY,
];

export class SeverityComparator {
  public static rank(severity: Severity): number {
    return SEVERITY_ORDER.indexOf(severity);
  }

  public static isAtLeast(severity: Severity, threshold: Severity): boolean {
    return SeverityComparator.rank(severity) >= SeverityComparator.rank(threshold);
  }

  public static isSeverity(value: unknown): value is Severity {
    return typeof value === "string" && SEVERITY_ORDER.some((s) => s === value);
  }

  /**
   * Parses a case-insensitive severity name, e.g. "warning" or "WARNING".
   */
  public static parse(value: string): Severity {
    const upper = value.trim().toUpperCase();
    if (!SeverityComparator.isSeverity(upper)) {
      throw new Error(
        `Invalid severity: ${value}. Must be one of: ${SEVERITY_ORDER.join(", ")}`
      );
    }
    return upper;
  }

  public static all(): Severity[] {
    return [...SEVERITY_ORDER];
  }
}
