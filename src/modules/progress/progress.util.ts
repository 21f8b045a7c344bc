const usdFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Text progress bar: `██████░░░░ 62%`
 */
export function makeProgressBar(current: number, target: number, length = 10): string {
  if (target <= 0) {
    return `${'░'.repeat(length)} 0%`;
  }

  const ratio = Math.min(current / target, 1);
  const filled = Math.floor(ratio * length);
  const percentage = Math.floor(ratio * 100);

  return `${'█'.repeat(filled)}${'░'.repeat(length - filled)} ${percentage}%`;
}

export function centsToUsd(cents: number): number {
  return Math.round(cents) / 100;
}

/**
 * `123450` -> `$1,234.50`
 */
export function formatUsd(cents: number): string {
  return `$${usdFormatter.format(centsToUsd(cents))}`;
}

/**
 * `415` -> `+ $4.15`
 */
export function formatEarningIncrement(cents: number): string {
  return `+ ${formatUsd(cents)}`;
}

export function calculateDailyRemaining(current: number, target: number): number {
  return Math.max(0, target - current);
}

export function calculatePercent(current: number, target: number): number {
  if (target <= 0) {
    return 0;
  }
  return Math.min(100, Math.floor((current / target) * 100));
}
