import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  assembleRun,
  buildTopology,
  lineSourceFromText,
  openLocalRunStore,
  resolveProbeSettings,
  statsFor,
  toStatsRow,
} from "../src/index.js";

const output = [
  "traceroute to example.test (203.0.113.9), 64 hops max, 60 byte packets",
  " 1  gw.example (192.168.1.1)  0.512 ms  0.488 ms  0.470 ms",
  " 2  * * *",
  " 3  core.example (10.0.0.2)  4.912 ms (10.0.0.3)  5.204 ms  5.118 ms",
  " 4  example.test (203.0.113.9)  9.871 ms  9.902 ms  *",
].join("\n");

const settings = resolveProbeSettings({ dialect: "modern", expectedTries: 3 });
const fileStore = openLocalRunStore({
  target: "example.test",
  dataDir: await mkdtemp(join(tmpdir(), "hopscope-example-")),
});

const run = await assembleRun(lineSourceFromText(output), {
  target: "example.test",
  command: "traceroute -q 3 example.test",
  dialect: settings.dialect,
  expectedTries: settings.expectedTries,
  echo: (line) => console.log(line),
});
await fileStore.append(run);

const store = await fileStore.load();
const report = statsFor(store, "example.test");

console.table(report.hops.map((entry) => ({ hop: entry.index, ...toStatsRow(entry.stats) })));
console.log(JSON.stringify(buildTopology(store, ["example.test"]), null, 2));
