import { hideBin } from "yargs/helpers";
import { run } from "./cli.ts";

await run(hideBin(process.argv));
