// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { InvalidValidityError } from "../errors";

export type KeyAlgorithm = "rsa" | "ecdsa";
export type KeySize = 1024 | 2048 | 3072 | 4096 | 8192;
export type CurveName = "P-256" | "P-384" | "P-521";
export type Filename = string;

export const supportedKeySizes: readonly KeySize[] = [1024, 2048, 3072, 4096, 8192];
export const supportedCurves: readonly CurveName[] = ["P-256", "P-384", "P-521"];

export function isKeySize(value: number): value is KeySize {
    return supportedKeySizes.some((size) => size === value);
}

export function isCurveName(value: string): value is CurveName {
    return supportedCurves.some((curve) => curve === value);
}

export const ONE_DAY = 24 * 60 * 60 * 1000;

/** the last instant a GeneralizedTime can carry */
export const MAX_NOT_AFTER = new Date(Date.UTC(9999, 11, 31, 23, 59, 59));

export interface ValidityWindow {
    notBefore: Date;
    notAfter: Date;
}

/**
 * compute the validity window of a certificate.
 *
 * `notBefore` is truncated to the second, as X.509 times carry no milliseconds,
 * and `notAfter` is exactly `validityDays` days of 24 hours later.
 * A window ending after {@link MAX_NOT_AFTER} is refused.
 */
export function computeValidityWindow(validityDays: number, startDate: Date = new Date()): ValidityWindow {
    if (!Number.isInteger(validityDays) || validityDays <= 0) {
        throw new InvalidValidityError(`validity must be a positive number of days (got ${validityDays})`);
    }
    if (Number.isNaN(startDate.getTime())) {
        throw new InvalidValidityError("invalid start date");
    }
    const notBefore = new Date(Math.floor(startDate.getTime() / 1000) * 1000);
    const notAfter = new Date(notBefore.getTime() + validityDays * ONE_DAY);
    if (Number.isNaN(notAfter.getTime()) || notAfter.getTime() > MAX_NOT_AFTER.getTime()) {
        throw new InvalidValidityError(`validity of ${validityDays} days ends after ${MAX_NOT_AFTER.toISOString()}`);
    }
    return { notBefore, notAfter };
}
