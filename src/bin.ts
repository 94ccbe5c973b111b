#!/usr/bin/env node
import dotenv from "dotenv";
import { run } from "./cli";

dotenv.config();

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
