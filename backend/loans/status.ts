// loans/status.ts
// Loan status vocabulary. All matches are case-sensitive and exact, except
// the late check, which is a substring match on "Late" ("Late (16-30 days)",
// "Late (31-120 days)") plus the exact "Default" status.

export const FULLY_PAID = "Fully Paid";
export const CURRENT_STATUSES: readonly string[] = ["Current", "In Grace Period"];
export const LATE_MARKER = "Late";
export const DEFAULT_STATUS = "Default";
export const CHARGED_OFF = "Charged Off";

export function isFullyPaid(status: string): boolean {
  return status === FULLY_PAID;
}

export function isCurrent(status: string): boolean {
  return CURRENT_STATUSES.includes(status);
}

export function isLate(status: string): boolean {
  return status.includes(LATE_MARKER) || status === DEFAULT_STATUS;
}

export function isChargedOff(status: string): boolean {
  return status === CHARGED_OFF;
}
