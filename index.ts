#!/usr/bin/env node
import process from "process";

import { run } from "./src/cli";

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((e) => {
        console.error(e);
        process.exitCode = 1;
    });
