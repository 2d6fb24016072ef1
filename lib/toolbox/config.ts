// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { InvalidConfigurationError } from "../errors";
import type { CurveName, KeyAlgorithm, KeySize } from "./common";

export interface Config {
    silent: boolean;
    /** smallest RSA modulus accepted, in bits */
    minRsaKeySize: number;
    /** smallest DH prime accepted, in bits */
    minDhBits: number;
    defaultValidityDays: number;
    defaultAlgorithm: KeyAlgorithm;
    defaultKeySize: KeySize;
    defaultCurve: CurveName;
    outputDir: string;
}

export const defaultConfig: Readonly<Config> = Object.freeze({
    silent: false,
    minRsaKeySize: 2048,
    minDhBits: 2048,
    defaultValidityDays: 365,
    defaultAlgorithm: "rsa",
    defaultKeySize: 2048,
    defaultCurve: "P-256",
    outputDir: "{CWD}/certificates",
});

export const g_config: Config = { ...defaultConfig };

export function resetConfiguration(): void {
    Object.assign(g_config, defaultConfig);
}

/**
 * replace the `{CWD}` and `{hostname}` placeholders
 */
export function performSubstitution(str: string): string {
    return str.replace(/\{CWD\}/g, process.cwd()).replace(/\{hostname\}/g, os.hostname());
}

function expectNumber(key: string, value: unknown): number {
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
        throw new InvalidConfigurationError(`configuration "${key}" must be a positive integer`);
    }
    return value;
}

function expectString(key: string, value: unknown): string {
    if (typeof value !== "string" || value.length === 0) {
        throw new InvalidConfigurationError(`configuration "${key}" must be a non empty string`);
    }
    return value;
}

/**
 * check a parsed configuration object and return the overrides it holds
 */
export function parseConfiguration(data: unknown): Partial<Config> {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        throw new InvalidConfigurationError("configuration must be a JSON object");
    }
    const result: Partial<Config> = {};
    for (const [key, value] of Object.entries(data)) {
        switch (key) {
            case "silent":
                if (typeof value !== "boolean") {
                    throw new InvalidConfigurationError(`configuration "silent" must be a boolean`);
                }
                result.silent = value;
                break;
            case "minRsaKeySize":
                result.minRsaKeySize = expectNumber(key, value);
                break;
            case "minDhBits":
                result.minDhBits = expectNumber(key, value);
                break;
            case "defaultValidityDays":
                result.defaultValidityDays = expectNumber(key, value);
                break;
            case "defaultAlgorithm":
                if (value !== "rsa" && value !== "ecdsa") {
                    throw new InvalidConfigurationError(`configuration "defaultAlgorithm" must be "rsa" or "ecdsa"`);
                }
                result.defaultAlgorithm = value;
                break;
            case "defaultKeySize":
                if (value !== 1024 && value !== 2048 && value !== 3072 && value !== 4096 && value !== 8192) {
                    throw new InvalidConfigurationError(`configuration "defaultKeySize" must be 1024, 2048, 3072, 4096 or 8192`);
                }
                result.defaultKeySize = value;
                break;
            case "defaultCurve":
                if (value !== "P-256" && value !== "P-384" && value !== "P-521") {
                    throw new InvalidConfigurationError(`configuration "defaultCurve" must be P-256, P-384 or P-521`);
                }
                result.defaultCurve = value;
                break;
            case "outputDir":
                result.outputDir = expectString(key, value);
                break;
            default:
                throw new InvalidConfigurationError(`unknown configuration key "${key}"`);
        }
    }
    return result;
}

/**
 * load a JSON configuration file and merge it into `g_config`
 */
export async function loadConfiguration(configFile: string): Promise<Config> {
    const filename = path.resolve(performSubstitution(configFile));
    let content: string;
    try {
        content = await fs.promises.readFile(filename, "utf-8");
    } catch (err) {
        throw new InvalidConfigurationError(`cannot read configuration file ${filename}`, { cause: err instanceof Error ? err : undefined });
    }
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        throw new InvalidConfigurationError(`configuration file ${filename} is not valid JSON`, {
            cause: err instanceof Error ? err : undefined,
        });
    }
    Object.assign(g_config, parseConfiguration(data));
    return g_config;
}
