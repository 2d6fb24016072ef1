// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";

import { toStorageError } from "../errors";
import { performSubstitution } from "./config";
import { debugLog } from "./debug";

export async function mkdirRecursive(folder: string): Promise<void> {
    if (!fs.existsSync(folder)) {
        debugLog(chalk.white(" .. constructing "), folder);
    }
    try {
        await fs.promises.mkdir(folder, { recursive: true });
    } catch (err) {
        throw toStorageError(err, folder);
    }
}

/**
 * join a folder and a file name, resolve the `{CWD}` and `{hostname}` placeholders
 * and use forward slashes, so that the result can be pasted in a server configuration file
 */
export function makePath(folderName: string, filename?: string): string {
    let s = path.resolve(performSubstitution(folderName));
    if (filename) {
        s = path.join(s, filename);
    }
    return s.replace(/\\/g, "/");
}
