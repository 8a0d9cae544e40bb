// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { format } from "node:util";
import winston from "winston";
import { getEnv } from "./getenv";

export const LogLevelVarName = "TILING_LOG_LEVEL";
export const LogFileVarName = "TILING_LOG_FILE";

const oldConsoleLog = console.log;

const loggerTransports: winston.transport[] = [new winston.transports.Console()];
const logFile = getEnv(LogFileVarName);
if (logFile != null) {
    loggerTransports.push(new winston.transports.File({ filename: logFile }));
}
const logger = winston.createLogger({
    level: getEnv(LogLevelVarName) ?? "info",
    format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
        winston.format.printf((info) => `${info.timestamp} [${info.level}] ${info.message}`)
    ),
    transports: loggerTransports,
});

function log(...msg: unknown[]) {
    try {
        logger.info(format(...msg));
    } catch (e) {
        oldConsoleLog(...msg);
    }
}

function warn(...msg: unknown[]) {
    try {
        logger.warn(format(...msg));
    } catch (e) {
        oldConsoleLog(...msg);
    }
}

export { log, warn };
