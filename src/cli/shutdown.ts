const STOP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Resolves with the first SIGINT or SIGTERM, removing its listeners after.
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      STOP_SIGNALS.forEach((s) => process.removeListener(s, onSignal));
      resolve(signal);
    };
    STOP_SIGNALS.forEach((s) => process.once(s, onSignal));
  });
}
