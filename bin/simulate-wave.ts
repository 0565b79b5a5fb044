#!/usr/bin/env node_modules/.bin/tsx

/**
 * Simulate a wave crossing one or more GeoJSON areas and print how the
 * traversed and remaining parts evolve.
 *
 * Usage: bin/simulate-wave.ts 'resources/areas/*.geojson' --speed 50 --steps 10
 */

import { glob } from "glob";
import yargs from "yargs";
import { DEFAULT_WAVE_SPEED } from "../src/config/constants";
import { totalArea } from "../src/core/util/Geometry";
import { LinearWave } from "../src/wave/LinearWave";
import { PolygonArea } from "../src/wave/PolygonArea";
import { position, type Polygon } from "../src/wave/Position";
import { WaveStateAccumulator } from "../src/wave/WaveStateAccumulator";
import type { WavePolygons } from "../src/wave/WaveTypes";
import { areaToGeoJson, loadAreaFile } from "../src/wave/io/AreaFileFormat";

async function loadAreas(patterns: string[]): Promise<Polygon[]> {
  const files = (await glob(patterns, { nodir: true })).sort();
  if (files.length === 0) {
    throw new Error(`No area files match: ${patterns.join(", ")}`);
  }

  const polygons: Polygon[] = [];
  for (const file of files) {
    const filePolygons = await loadAreaFile(file);
    console.log(`Loaded ${file}: ${filePolygons.length} polygon(s)`);
    polygons.push(...filePolygons);
  }
  return polygons;
}

async function main() {
  const argv = await yargs(process.argv.slice(2))
    .scriptName("simulate-wave")
    .usage("$0 <areas..>\n\nSimulate a wave sweeping GeoJSON areas (files or glob patterns)")
    .demandCommand(1, "Pass at least one area file or glob pattern")
    .option("speed", { type: "number", default: DEFAULT_WAVE_SPEED, describe: "Wave speed (m/s)" })
    .option("direction", {
      choices: ["east", "west"] as const,
      default: "east" as const,
      describe: "Direction of travel",
    })
    .option("mode", {
      choices: ["add", "recompose"] as const,
      default: "add" as const,
      describe: "How traversed polygons accumulate",
    })
    .option("steps", { type: "number", default: 10, describe: "Number of snapshots" })
    .option("lat", { type: "number", describe: "Observer latitude" })
    .option("lng", { type: "number", describe: "Observer longitude" })
    .option("geojson", {
      type: "boolean",
      default: false,
      describe: "Print the final traversed polygons as GeoJSON",
    })
    .example("$0 area.geojson --speed 100 --direction west", "Westward wave at 100 m/s")
    .help()
    .parse();

  const area = new PolygonArea(await loadAreas(argv._.map(String)));

  // Simulated time: the event starts at 0 and runs for the wave duration
  let now = 0;
  const clock = { now: () => now };
  let duration = 0;
  const event = {
    getStartDateTime: () => 0,
    isRunning: () => now >= 0 && now <= duration,
    isDone: () => now > duration,
  };

  const wave = new LinearWave(
    { speed: argv.speed, direction: argv.direction },
    { area, event, clock },
  );
  for (const error of wave.validationErrors() ?? []) {
    console.warn(`[simulate-wave] ${error}`);
  }

  duration = wave.getWaveDuration();
  console.log(`Speed: ${wave.getLiteralSpeed()}, duration: ${wave.getLiteralTotalTime()}`);
  console.log(`Bands: ${wave.getBands().length}, area: ${totalArea(area.getPolygons()).toFixed(6)} deg²`);

  const observer =
    argv.lat !== undefined && argv.lng !== undefined ? position(argv.lat, argv.lng) : null;

  const accumulator = new WaveStateAccumulator(wave);
  const steps = Math.max(1, Math.floor(argv.steps));
  let state: WavePolygons | null = null;

  for (let i = 0; i <= steps; i++) {
    now = (duration * i) / steps;
    state = accumulator.getWavePolygons(area.getPolygons(), state, argv.mode, now);

    let line =
      `[${wave.getLiteralProgression(now).padStart(4)}] ` +
      `front ${state.referenceLongitude.toFixed(5)}  ` +
      `traversed ${state.traversedPolygons.length} (${totalArea(state.traversedPolygons).toFixed(6)})  ` +
      `remaining ${state.remainingPolygons.length} (${totalArea(state.remainingPolygons).toFixed(6)})`;
    if (observer) {
      const hit = wave.hasBeenHit(observer, now);
      const eta = wave.timeBeforeHit(observer, now);
      line += hit ? "  observer: hit" : `  observer: ${eta === null ? "outside" : `${(eta / 1000).toFixed(1)}s`}`;
    }
    console.log(line);
  }

  if (argv.geojson && state) {
    console.log(JSON.stringify(areaToGeoJson(state.traversedPolygons), null, 2));
  }
}

main().catch((error) => {
  console.error("Failed to simulate wave:", error);
  process.exit(1);
});
