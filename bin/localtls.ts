#!/usr/bin/env node
// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { hideBin } from "yargs/helpers";

import { main } from "../lib/cli/localtls_cli";

main(hideBin(process.argv)).then(
    (exitCode) => {
        process.exitCode = exitCode;
    },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
