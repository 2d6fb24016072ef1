// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import net from "node:net";
import * as ipaddr from "ipaddr.js";

import { InvalidSubjectAltNameError } from "../errors";

export type SubjectAltNameType = "dns" | "ip";

export interface SubjectAltName {
    type: SubjectAltNameType;
    value: string;
}

/** ordered, without duplicates */
export type SANList = SubjectAltName[];

const labelRegExp = /^[a-z0-9_]([a-z0-9_-]{0,61}[a-z0-9_])?$/i;

export function isValidDnsName(name: string): boolean {
    if (name.length === 0 || name.length > 253) {
        return false;
    }
    const labels = (name.endsWith(".") ? name.slice(0, -1) : name).split(".");
    return labels.every((label, index) => (index === 0 && label === "*" && labels.length > 1) || labelRegExp.test(label));
}

/**
 * the canonical text of an IP address, or undefined when `address` is not one.
 *
 * IPv6 addresses follow RFC 5952 (lower case, longest run of zeros compressed);
 * an IPv4-mapped IPv6 address becomes the IPv4 address it maps.
 */
export function canonicalIpAddress(address: string): string | undefined {
    // zone indices have no meaning in a certificate
    if (!net.isIP(address) || address.includes("%")) {
        return undefined;
    }
    const parsed = ipaddr.parse(address);
    if (parsed instanceof ipaddr.IPv6) {
        return parsed.isIPv4MappedAddress() ? parsed.toIPv4Address().toString() : parsed.toRFC5952String();
    }
    return parsed.toString();
}

function sanKey(san: SubjectAltName): string {
    return san.type + ":" + san.value.toLowerCase();
}

/**
 * parse one entry: `DNS:name`, `IP:address`, or a bare value
 * (an IP address when it looks like one, a DNS name otherwise)
 */
export function parseSubjectAltName(entry: string): SubjectAltName {
    const str = entry.trim();
    const m = str.match(/^(DNS|IP):(.*)$/i);
    let san: SubjectAltName;
    if (m) {
        san = { type: m[1].toUpperCase() === "IP" ? "ip" : "dns", value: m[2].trim() };
    } else {
        san = { type: net.isIP(str) ? "ip" : "dns", value: str };
    }
    return checkSubjectAltName(san);
}

export function checkSubjectAltName(san: SubjectAltName): SubjectAltName {
    if (san.type === "ip") {
        const address = canonicalIpAddress(san.value);
        if (address === undefined) {
            throw new InvalidSubjectAltNameError(`invalid IP address "${san.value}"`);
        }
        return { type: "ip", value: address };
    }
    if (!isValidDnsName(san.value)) {
        throw new InvalidSubjectAltNameError(`invalid DNS name "${san.value}"`);
    }
    return san;
}

/**
 * check a host name that goes into a web server configuration:
 * a DNS name (wildcards allowed) or an IP address
 */
export function checkServerName(serverName: string): string {
    if (canonicalIpAddress(serverName) === undefined && !isValidDnsName(serverName)) {
        throw new InvalidSubjectAltNameError(`invalid server name "${serverName}"`);
    }
    return serverName;
}

/**
 * validate a list of entries and drop the duplicates, keeping the first occurrence
 */
export function normalizeSubjectAltNames(entries: Iterable<SubjectAltName>): SANList {
    const seen = new Set<string>();
    const result: SANList = [];
    for (const entry of entries) {
        const san = checkSubjectAltName(entry);
        const key = sanKey(san);
        if (!seen.has(key)) {
            seen.add(key);
            result.push({ type: san.type, value: san.value });
        }
    }
    return result;
}

/**
 * parse a comma separated list, or several of them
 */
export function parseSubjectAltNames(list: string | string[]): SANList {
    const items = (Array.isArray(list) ? list : [list])
        .flatMap((s) => s.split(","))
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
    return normalizeSubjectAltNames(items.map(parseSubjectAltName));
}

export function formatSubjectAltName(san: SubjectAltName): string {
    return (san.type === "ip" ? "IP:" : "DNS:") + san.value;
}

/**
 * true if the list covers the given host, either literally or through a wildcard entry
 */
export function sanListCoversHost(sanList: SANList, host: string): boolean {
    const address = canonicalIpAddress(host);
    const type: SubjectAltNameType = address !== undefined ? "ip" : "dns";
    const lowerHost = (address ?? host).toLowerCase();
    return sanList.some((san) => {
        if (san.type !== type) {
            return false;
        }
        const value = san.value.toLowerCase();
        if (value === lowerHost) {
            return true;
        }
        if (value.startsWith("*.")) {
            const suffix = value.substring(1);
            const head = lowerHost.substring(0, lowerHost.length - suffix.length);
            return lowerHost.endsWith(suffix) && head.length > 0 && !head.includes(".");
        }
        return false;
    });
}
