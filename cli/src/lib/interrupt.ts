import { EXIT_CANCELLED } from './errors.js';
import { printWarning, showCursor } from './output.js';

/**
 * First Ctrl+C calls `cancel`; a second one exits at once with 130.
 * @returns A function that removes the handler.
 */
export function onInterrupt(cancel: () => void): () => void {
  let cancelCount = 0;
  const handler = (): void => {
    cancelCount++;
    if (cancelCount === 1) {
      printWarning('Cancelling. Press Ctrl+C again to exit immediately.');
      cancel();
    } else {
      showCursor();
      process.exit(EXIT_CANCELLED);
    }
  };
  process.on('SIGINT', handler);
  return () => {
    process.removeListener('SIGINT', handler);
  };
}
