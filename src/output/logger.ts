/**
 * File logging of engine events
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Engine event for structured logging
 */
export interface StoryEvent {
  type: 'taleloom';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  logEvent(event: Omit<StoryEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Logger that discards everything
 */
export function createNullLogger(): Logger {
  return {
    logEvent: () => undefined,
    close: () => undefined,
    filePath: null,
  };
}

/**
 * Create a logger that writes to a timestamped log file
 *
 * @param scriptName - Script path; its base name starts the log file name
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  scriptName: string
): Logger {
  if (!enabled) {
    return createNullLogger();
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Create timestamped filename
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(scriptName, path.extname(scriptName));
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    logEvent(eventData: Omit<StoryEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'taleloom' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
