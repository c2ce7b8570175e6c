import winston from "winston";
import path from "path";

export class Logger {
  private static instance: winston.Logger;

  public static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = Logger.createLogger();
    }
    return Logger.instance;
  }

  private static createLogger(options: { level?: string } = {}): winston.Logger {
    // Read straight from the environment: Config itself logs through here
    const logLevel =
      options.level || process.env.LOG_LEVEL?.toLowerCase() || "info";
    const logToFile = process.env.LOG_TO_FILE !== "false";

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: true }),
          winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            let metaStr = "";
            if (Object.keys(meta).length > 0) {
              metaStr = " " + JSON.stringify(meta, null, 2);
            }
            return `${timestamp} [${level}]: ${message}${metaStr}`;
          })
        ),
      }),
    ];

    if (logToFile) {
      const logDir = process.env.LOG_DIR || "./data";
      const logFile = path.join(logDir, "playlist-porter.log");

      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: winston.format.combine(
            winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
            winston.format.json()
          ),
          maxsize: 20 * 1024 * 1024, // 20MB
          maxFiles: 5,
        })
      );
    }

    return winston.createLogger({
      level: logLevel,
      transports,
      handleExceptions: true,
      handleRejections: true,
      exitOnError: false,
    });
  }

  // Used by the CLI's --verbose flag
  public static reconfigure(options: { level?: string }): void {
    if (Logger.instance) {
      Logger.instance.close();
    }
    Logger.instance = Logger.createLogger(options);
  }
}
