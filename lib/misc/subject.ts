// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import type { JsonName } from "@peculiar/x509";

import { InvalidSubjectError } from "../errors";

export interface SubjectOptions {
    commonName?: string;
    organization?: string;
    organizationalUnit?: string;
    locality?: string;
    state?: string;
    country?: string;
}

/**
 * the identity a certificate is issued for. Only the common name is mandatory.
 */
export interface SubjectIdentity extends SubjectOptions {
    commonName: string;
}

type SubjectField = keyof SubjectOptions;

// in the order used by openssl when it prints a subject line
const _fields: [string, SubjectField][] = [
    ["C", "country"],
    ["ST", "state"],
    ["L", "locality"],
    ["O", "organization"],
    ["OU", "organizationalUnit"],
    ["CN", "commonName"],
];

function longNameOf(shortName: string): SubjectField | undefined {
    const entry = _fields.find(([s]) => s === shortName.toUpperCase());
    return entry ? entry[1] : undefined;
}

const enquoteIfNecessary = (str: string) => {
    str = str.replace(/"/g, "”");
    return str.match(/\/|=/) ? `"${str}"` : str;
};
const unquote = (str: string) => str.replace(/"/gm, "");
const unquote2 = (str?: string | undefined) => {
    if (!str) return str;
    const m = str.match(/^"(.*)"$/);
    return m ? m[1] : str;
};

/**
 * The subject of a certificate.
 *
 * It can be built from an object or from an openssl `-subj` line such as
 * `/C=FR/ST=IDF/L=Paris/O=Acme/CN=localhost`.
 */
export class Subject implements SubjectOptions {
    public readonly commonName?: string;
    public readonly organization?: string;
    public readonly organizationalUnit?: string;
    public readonly locality?: string;
    public readonly state?: string;
    public readonly country?: string;

    constructor(options: SubjectOptions | string) {
        if (typeof options === "string") {
            options = Subject.parse(options);
        }
        this.commonName = unquote2(options.commonName);
        this.organization = unquote2(options.organization);
        this.organizationalUnit = unquote2(options.organizationalUnit);
        this.locality = unquote2(options.locality);
        this.state = unquote2(options.state);
        this.country = unquote2(options.country);
    }

    public static parse(str: string): SubjectOptions {
        const elements = str.split(/\/(?=[^/]*?=)/);
        const options: SubjectOptions = {};

        for (const element of elements) {
            if (element.length === 0) {
                continue;
            }
            const s: string[] = element.split("=");

            if (s.length !== 2) {
                throw new InvalidSubjectError("invalid format for " + element);
            }
            const longName = longNameOf(s[0].trim());
            if (!longName) {
                throw new InvalidSubjectError("Invalid field found in subject name " + s[0]);
            }
            options[longName] = unquote(s[1]);
        }
        return options;
    }

    /**
     * the subject line, without the leading slash
     */
    public toStringWithoutSlash(): string {
        const tmp: string[] = [];
        for (const [shortName, longName] of _fields) {
            const value = this[longName];
            if (value) {
                tmp.push(shortName + "=" + enquoteIfNecessary(value));
            }
        }
        return tmp.join("/");
    }

    /**
     * the name, as @peculiar/x509 expects it: one relative distinguished name per field
     */
    public toJsonName(): JsonName {
        const name: JsonName = [];
        for (const [shortName, longName] of _fields) {
            const value = this[longName];
            if (value) {
                name.push({ [shortName]: [value] });
            }
        }
        return name;
    }

    public toJSON(): SubjectOptions {
        const result: SubjectOptions = {};
        for (const [, longName] of _fields) {
            const value = this[longName];
            if (value) {
                result[longName] = value;
            }
        }
        return result;
    }

    public toString(): string {
        // standard for SSL is to have a / in front of each Field
        // see https://www.digicert.com/kb/ssl-support/openssl-quick-reference-guide.htm
        const t = this.toStringWithoutSlash();
        return t ? "/" + t : t;
    }
}

/**
 * check a subject and return it as a SubjectIdentity
 */
export function validateSubject(subject: SubjectOptions): SubjectIdentity {
    const commonName = (subject.commonName || "").trim();
    if (commonName.length === 0) {
        throw new InvalidSubjectError("subject must have a Common Name");
    }
    if (subject.country !== undefined && subject.country !== "" && !/^[A-Za-z]{2}$/.test(subject.country)) {
        throw new InvalidSubjectError(`country must be a two letter code (got "${subject.country}")`);
    }
    return { ...new Subject(subject).toJSON(), commonName };
}
