import path from "node:path";
import { rimraf } from "rimraf";

import { g_config, mkdirRecursive, resetConfiguration, warningLog } from "../lib";

const tmpFolder = path.join(__dirname, "../tmp");

function quiet(): void {
    resetConfiguration();
    g_config.silent = !process.env.VERBOSE;
}

quiet();

/**
 * await a promise that must fail and return what it has been rejected with
 */
export async function catchError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error("expecting the operation to fail");
}

export function catchErrorSync(func: () => unknown): unknown {
    try {
        func();
    } catch (err) {
        return err;
    }
    throw new Error("expecting the operation to fail");
}

let doneOnce = false;

interface TestData {
    tmpFolder: string;
}

export function beforeTest(self: Mocha.Suite, f?: () => Promise<void>): TestData {
    self.timeout("5 minutes");

    const testData: TestData = {
        tmpFolder,
    };

    before(async () => {
        if (process.env.LOCALTLS_TEST === "NOCLEAN") {
            doneOnce = true;
        }
        if (!doneOnce) {
            doneOnce = true;
            warningLog("    .... cleaning temporary folders ...", tmpFolder);
            await rimraf(tmpFolder);
            await mkdirRecursive(tmpFolder);
        }
        if (f) {
            await f();
        }
    });
    beforeEach(() => {
        quiet();
    });
    return testData;
}
