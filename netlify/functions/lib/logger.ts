type LogArgs = unknown[];

const debugEnabled = () => process.env.FEEDBACK_DEBUG === 'true';

export const Logger = {
  debug: (message: string, ...args: LogArgs) => {
    if (!debugEnabled()) return;
    console.log(`[Feedback Debug] ${message}`, ...args);
  },

  info: (message: string, ...args: LogArgs) => {
    console.log(`[Feedback] ${message}`, ...args);
  },

  warn: (message: string, ...args: LogArgs) => {
    console.warn(`[Feedback Warning] ${message}`, ...args);
  },

  error: (message: string, ...args: LogArgs) => {
    console.error(`[Feedback Error] ${message}`, ...args);
  }
};

export function describeError(error: unknown) {
  return {
    error: error instanceof Error ? error.message : 'Unknown error',
    type: error instanceof Error ? error.constructor.name : typeof error,
    cause: error instanceof Error ? error.cause : undefined
  };
}
