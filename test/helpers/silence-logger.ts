import { Logger } from '@nestjs/common';

/**
 * Silences NestJS Logger output for noisy test scenarios.
 * Returns a restore function to reinstate original behavior.
 */
export function silenceNestLogger(): () => void {
  const spies = (['log', 'warn', 'error'] as const).map((method) =>
    jest.spyOn(Logger.prototype, method).mockImplementation(() => undefined),
  );

  return () => {
    spies.forEach((spy) => spy.mockRestore());
  };
}
