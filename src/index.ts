#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { main } from "./cli";

main(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
