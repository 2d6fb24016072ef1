import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import should from "should";

import {
    InvalidConfigurationError,
    defaultConfig,
    g_config,
    loadConfiguration,
    mkdirRecursive,
    parseConfiguration,
    performSubstitution,
    resetConfiguration,
} from "../lib";
import { beforeTest, catchError, catchErrorSync } from "./helpers";

describe("configuration", function (this: Mocha.Suite) {
    const testData = beforeTest(this);

    let folder: string;
    before(async () => {
        folder = path.join(testData.tmpFolder, "config");
        await mkdirRecursive(folder);
    });
    after(() => {
        resetConfiguration();
    });

    it("should substitute {CWD} and {hostname}", () => {
        performSubstitution("{CWD}/certificates").should.eql(process.cwd() + "/certificates");
        performSubstitution("{hostname}.local").should.eql(os.hostname() + ".local");
        performSubstitution("/etc/ssl").should.eql("/etc/ssl");
        performSubstitution("{CWD}/a:{CWD}/b").should.eql(`${process.cwd()}/a:${process.cwd()}/b`);
    });

    it("should accept the known keys", () => {
        parseConfiguration({ minRsaKeySize: 3072, defaultAlgorithm: "ecdsa", defaultCurve: "P-384", silent: true }).should.eql({
            minRsaKeySize: 3072,
            defaultAlgorithm: "ecdsa",
            defaultCurve: "P-384",
            silent: true,
        });
    });

    it("should reject unknown keys and wrong values", () => {
        const invalid: unknown[] = [
            [],
            "x",
            null,
            { unknownKey: 1 },
            { defaultValidityDays: 0 },
            { defaultValidityDays: 1.5 },
            { defaultKeySize: 1234 },
            { defaultAlgorithm: "dsa" },
            { silent: "yes" },
            { outputDir: "" },
        ];
        for (const data of invalid) {
            should(catchErrorSync(() => parseConfiguration(data))).be.instanceOf(InvalidConfigurationError, JSON.stringify(data));
        }
    });

    it("should merge a configuration file into g_config", async () => {
        const configFile = path.join(folder, "good.json");
        await fs.promises.writeFile(configFile, JSON.stringify({ defaultValidityDays: 30, minDhBits: 1024 }));

        const config = await loadConfiguration(configFile);
        config.should.equal(g_config);
        g_config.defaultValidityDays.should.eql(30);
        g_config.minDhBits.should.eql(1024);
        g_config.minRsaKeySize.should.eql(defaultConfig.minRsaKeySize);

        resetConfiguration();
        g_config.defaultValidityDays.should.eql(365);
        g_config.minDhBits.should.eql(2048);
    });

    it("should reject a file that is not JSON", async () => {
        const configFile = path.join(folder, "bad.json");
        await fs.promises.writeFile(configFile, "{ defaultValidityDays: ");
        should(await catchError(loadConfiguration(configFile))).be.instanceOf(InvalidConfigurationError);
    });

    it("should reject a missing file", async () => {
        const err = await catchError(loadConfiguration(path.join(folder, "missing.json")));
        should(err).be.instanceOf(InvalidConfigurationError);
    });
});
