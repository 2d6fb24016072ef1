// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import chalk from "chalk";

import { g_config } from "./config";

export const doDebug = !!process.env.LOCALTLS_DEBUG;

export function debugLog(...args: unknown[]): void {
    // istanbul ignore next
    if (doDebug) {
        console.log(...args);
    }
}

export function warningLog(...args: unknown[]): void {
    // istanbul ignore next
    if (!g_config.silent) {
        console.log(...args);
    }
}

export function errorLog(...args: unknown[]): void {
    console.error(chalk.redBright("ERROR : "), ...args);
}
