/**
 * Process title marking for processes that must outlive the initrd.
 *
 * systemd leaves processes whose argv[0] starts with '@' running when it
 * kills everything at the switch to the real root filesystem
 * (https://systemd.io/ROOT_STORAGE_DAEMONS/). systemd v255 and later can do
 * the same with SurviveFinalKillSignal=yes in the unit.
 *
 * @module service/process-title
 */

/**
 * Returns `title` with its first character replaced by '@'.
 */
export function markSurviveKillSignal(title: string): string {
  if (title.startsWith("@")) {
    return title;
  }
  return `@${title.slice(1)}`;
}

/**
 * Rewrites the title of the current process.
 */
export function applySurviveKillSignal(): void {
  process.title = markSurviveKillSignal(process.title);
}
