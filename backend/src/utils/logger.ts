/**
 * Simple logger with category-based filtering
 * Control what gets logged via environment variables
 */

// Log categories that can be toggled
export const LogCategories = {
  SCHEDULER: process.env.LOG_SCHEDULER !== 'false', // On by default - dispatch, claims, bumps
  JOBS: process.env.LOG_JOBS !== 'false',           // On by default - job lifecycle
  INFERENCE: process.env.LOG_INFERENCE === 'true',  // Off by default - prompts and model calls
  HTTP: process.env.LOG_HTTP === 'true',            // Off by default - request details
  DEBUG: process.env.LOG_DEBUG === 'true',          // Off by default - noisy debug logs
  ALL: process.env.LOG_ALL === 'true'               // Override to see everything
} as const;

export class Logger {
  static scheduler(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.SCHEDULER) {
      console.log(...args);
    }
  }

  static jobs(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.JOBS) {
      console.log(...args);
    }
  }

  static inference(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.INFERENCE) {
      console.log(...args);
    }
  }

  static http(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.HTTP) {
      console.log(...args);
    }
  }

  static debug(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.DEBUG) {
      console.log(...args);
    }
  }

  static error(...args: unknown[]) {
    // Always log errors
    console.error(...args);
  }

  static warn(...args: unknown[]) {
    // Always log warnings
    console.warn(...args);
  }

  static info(...args: unknown[]) {
    // Always log important info
    console.log(...args);
  }
}

// Show current log settings on startup
export function logSettings(): void {
  console.log('📊 Log Settings:');
  console.log(`  Scheduler: ${LogCategories.SCHEDULER ? '✅' : '❌'} (LOG_SCHEDULER)`);
  console.log(`  Jobs: ${LogCategories.JOBS ? '✅' : '❌'} (LOG_JOBS)`);
  console.log(`  Inference: ${LogCategories.INFERENCE ? '✅' : '❌'} (LOG_INFERENCE)`);
  console.log(`  HTTP: ${LogCategories.HTTP ? '✅' : '❌'} (LOG_HTTP)`);
  console.log(`  Debug: ${LogCategories.DEBUG ? '✅' : '❌'} (LOG_DEBUG)`);
  console.log('  To change: LOG_DEBUG=true LOG_JOBS=false npm start\n');
}
