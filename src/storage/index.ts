export {
  isErrnoException,
  ensureDir,
  readJSON,
  writeJSON,
  appendJSONLine,
  withLock,
} from "./engine.js";

export {
  EVIDENCE_SUBDIRS,
  CHUNKS_SUBDIR,
  RESULTS_SUBDIR,
  DEEPER_SUBDIR,
  EvidenceLayout,
  categoryForPhase,
  fileTimestamp,
  caseIdFromDumpPath,
  runDirectoryName,
} from "./evidence.js";

export { getIndex, updateIndexEntry, listInvestigations } from "./state.js";
