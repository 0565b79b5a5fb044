export { ComposedLongitude, type Side } from "./ComposedLongitude";
export * from "./GeoUtils";
export { LinearWave, type LinearWaveConfig, type LinearWaveContext } from "./LinearWave";
export { PolygonArea } from "./PolygonArea";
export { recomposeCutPolygons } from "./PolygonRecompose";
export {
  classifySplit,
  splitAreaToWave,
  splitByComposedLongitude,
  splitByLongitude,
  type ClassifiedSplit,
  type SplitResult,
} from "./PolygonSplitter";
export * from "./Position";
export { PositionObserver } from "./PositionObserver";
export { ProgressionSampler, type ProgressionSamplerOptions } from "./ProgressionSampler";
export * from "./WaveBands";
export { WaveObserver, type WaveObserverOptions, type WaveObserverState } from "./WaveObserver";
export { WaveStateAccumulator } from "./WaveStateAccumulator";
export * from "./WaveTypes";
export { areaToGeoJson, loadAreaFile, parseAreaFile } from "./io/AreaFileFormat";
