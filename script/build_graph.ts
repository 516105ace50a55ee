// Offline graph build: reads the raw catalog and reference lists, writes the
// four artifact files the server loads at startup.
import dotenv from "dotenv";
dotenv.config();

import { loadEngineConfig } from "../server/config";
import { buildAndPersistGraph } from "../server/graph/graphService";

async function main() {
  const config = loadEngineConfig();
  console.log(`[build-graph] catalog ${config.catalogPath}`);

  const { report, files } = await buildAndPersistGraph(config);

  for (const file of files) console.log(`[build-graph] wrote ${file}`);
  console.log(
    `[build-graph] done: ${report.components} components, ${report.nodes} nodes, ${report.edges} edges`,
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
