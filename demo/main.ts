// demo/main.ts
//
// Usage: npm run demo -- <paste-layer.gbr | gerbers.zip> [groups.json]

import { readFile } from "node:fs/promises";
import {
  analyzeGerberFile,
  analyzePasteLayersFromZip,
  formatAnalysisStatus,
  loadGroupsFromFile,
  padSummary,
  ThicknessManager,
  type LayerAnalysis,
} from "../src";

async function main(): Promise<void> {
  const [input, groupsFile] = process.argv.slice(2);
  if (!input) {
    console.error("usage: main.ts <paste-layer.gbr | gerbers.zip> [groups.json]");
    process.exitCode = 2;
    return;
  }

  const manager = new ThicknessManager();
  if (groupsFile) {
    await loadGroupsFromFile(manager, groupsFile);
  }

  let layers: LayerAnalysis[];
  if (input.toLowerCase().endsWith(".zip")) {
    layers = await analyzePasteLayersFromZip(await readFile(input), { overrides: manager });
  } else {
    layers = [await analyzeGerberFile(input, { overrides: manager })];
  }

  for (const layer of layers) {
    console.log(formatAnalysisStatus(layer));
    for (const pad of layer.parse.pads.slice(0, 10)) {
      const s = padSummary(pad, manager);
      console.log(
        `  #${s.id} ${s.shape} at (${s.position.x.toFixed(3)}, ${s.position.y.toFixed(3)}) ` +
          `area ${s.area.toFixed(4)} thickness ${s.thickness} volume ${s.volume.toFixed(5)}` +
          (s.isOverridden ? " *" : "")
      );
    }
    for (const problem of layer.parse.problems.slice(0, 10)) {
      console.log(`  line ${problem.line}: ${problem.kind} ${problem.message}`);
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
