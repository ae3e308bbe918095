type Cancellable = { cancel(): void };

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * First SIGINT/SIGTERM cancels the run and lets workers wind down, the second
 * exits at once. Partial downloads only ever exist as `.part` files, so an
 * immediate exit leaves no truncated file under a final name.
 *
 * Returns a function that removes the handlers.
 */
export function installSignalHandlers(
  session: Cancellable,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  let received = 0;

  const handler = (signal: NodeJS.Signals) => {
    received++;
    if (received === 1) {
      console.log(`\n⚠️  ${signal} received, cancelling. Send it again to exit immediately.`);
      session.cancel();
      return;
    }
    console.log(`\n🛑 ${signal} received again, exiting`);
    exit(130);
  };

  for (const signal of SIGNALS) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of SIGNALS) {
      process.off(signal, handler);
    }
  };
}
