export {
  withTempDir,
  writeCorpus,
  scriptHeader,
  silentLogger,
  type FixtureFile,
} from "./corpus.js";
