import type {
  TransferProgress,
  ProgressListener,
} from "../transfer/progress-stream.js";

/**
 * "transferred / total (pp.pp%)", or "transferred bytes" when the total
 * is unknown
 */
export function formatProgressLine(progress: TransferProgress): string {
  const { transferred, total } = progress;
  if (total === undefined) {
    return `${transferred} bytes`;
  }
  const percentage = total === 0 ? 100 : (transferred / total) * 100;
  return `${transferred} / ${total} (${percentage.toFixed(2)}%)`;
}

export interface TransferProgressDisplay {
  /** Record new progress (redraws the line in interactive mode) */
  update: ProgressListener;
  /** Terminate the progress line */
  finish: () => void;
}

/**
 * Single-line progress display for uploads and downloads.
 * @param interactive - Rewrite the line in place with "\r"; otherwise only
 *   the final state is printed by finish()
 */
export function createTransferProgress(
  interactive: boolean = process.stdout.isTTY === true,
): TransferProgressDisplay {
  let last: TransferProgress | undefined;

  return {
    update: (progress: TransferProgress): void => {
      last = progress;
      if (interactive) {
        process.stdout.write(`\r${formatProgressLine(progress)}`);
      }
    },

    finish: (): void => {
      if (!last) return;
      if (interactive) {
        process.stdout.write("\n");
      } else {
        process.stdout.write(`${formatProgressLine(last)}\n`);
      }
    },
  };
}
