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

import { UnknownTemplateError } from "../errors";
import type { Filename } from "../toolbox/common";

export type TemplateId = "nginx" | "apache" | "caddy";

interface TemplateDefinition {
    /** the template file, in the templates folder */
    source: string;
    /** the name of the rendered file */
    outputFile: string;
}

const templateDefinitions: Record<TemplateId, TemplateDefinition> = {
    nginx: { source: "nginx.conf", outputFile: "nginx.conf" },
    apache: { source: "apache.conf", outputFile: "apache.conf" },
    caddy: { source: "Caddyfile", outputFile: "Caddyfile" },
};

export const templateIds = Object.keys(templateDefinitions).filter(isTemplateId);

export function isTemplateId(name: string): name is TemplateId {
    return Object.prototype.hasOwnProperty.call(templateDefinitions, name);
}

/**
 * the TLS 1.2 cipher suites of the "intermediate" compatibility profile,
 * TLS 1.3 suites are not configurable through these directives
 */
export const recommendedCiphers: readonly string[] = [
    "ECDHE-ECDSA-AES128-GCM-SHA256",
    "ECDHE-RSA-AES128-GCM-SHA256",
    "ECDHE-ECDSA-AES256-GCM-SHA384",
    "ECDHE-RSA-AES256-GCM-SHA384",
    "ECDHE-ECDSA-CHACHA20-POLY1305",
    "ECDHE-RSA-CHACHA20-POLY1305",
    "DHE-RSA-AES128-GCM-SHA256",
    "DHE-RSA-AES256-GCM-SHA384",
    "DHE-RSA-CHACHA20-POLY1305",
];

export interface RenderPaths {
    certificateFile: Filename;
    privateKeyFile: Filename;
    dhParamFile?: Filename;
}

export interface RenderOptions {
    template: string;
    paths: RenderPaths;
    /** defaults to localhost */
    serverName?: string;
}

export interface RenderedConfig {
    template: TemplateId;
    outputFile: string;
    content: string;
}

function findTemplateFolder(): string {
    const candidates = [
        path.join(__dirname, "templates"),
        // when running from dist/lib/render
        path.join(__dirname, "../../../lib/render/templates"),
    ];
    return candidates.find((folder) => fs.existsSync(folder)) ?? candidates[0];
}

/**
 * substitute the `{{name}}` placeholders of a template.
 * A line that refers to a missing value is dropped.
 */
export function renderTemplate(template: string, values: Record<string, string | undefined>): string {
    const lines: string[] = [];
    for (const line of template.split("\n")) {
        let keep = true;
        const rendered = line.replace(/\{\{(\w+)\}\}/g, (match: string, name: string) => {
            if (!Object.prototype.hasOwnProperty.call(values, name)) {
                return match;
            }
            const value = values[name];
            if (value === undefined) {
                keep = false;
                return "";
            }
            return value;
        });
        if (keep) {
            lines.push(rendered);
        }
    }
    return lines.join("\n");
}

/**
 * Produce web server configuration fragments that use the generated files.
 */
export class ConfigRenderer {
    public readonly templateFolder: string;
    readonly #cache = new Map<TemplateId, string>();

    constructor(templateFolder?: string) {
        this.templateFolder = templateFolder ?? findTemplateFolder();
    }

    #loadTemplate(template: TemplateId): string {
        let text = this.#cache.get(template);
        if (text === undefined) {
            text = fs.readFileSync(path.join(this.templateFolder, templateDefinitions[template].source), "utf-8");
            this.#cache.set(template, text);
        }
        return text;
    }

    public render(options: RenderOptions): RenderedConfig {
        if (!isTemplateId(options.template)) {
            throw new UnknownTemplateError(`unknown template "${options.template}", expecting one of ${templateIds.join(",")}`);
        }
        const template = options.template;
        const content = renderTemplate(this.#loadTemplate(template), {
            serverName: options.serverName || "localhost",
            certificateFile: options.paths.certificateFile,
            privateKeyFile: options.paths.privateKeyFile,
            dhParamFile: options.paths.dhParamFile,
            ciphers: recommendedCiphers.join(":"),
        }).trimEnd() + "\n";
        return { template, outputFile: templateDefinitions[template].outputFile, content };
    }
}
