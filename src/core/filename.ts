import { DEFAULT_FILENAME, RECORDING_EXTENSION } from "../shared/constants.js";
import type { RawConfigMap, ResolutionEnvironment } from "../shared/types.js";
import { formatConfigValue, isBlankValue } from "../config/legacy.js";
import { joinPath } from "../utils/path.js";
import { defaultEnvironment } from "./environment.js";
import { buildPlaceholders } from "./placeholders.js";
import { sanitizeOutputPath } from "./sanitize.js";
import { expandTemplate } from "./template.js";

export interface ResolveFilenameOptions {
  fallbackFilename?: string;
  environment?: ResolutionEnvironment;
}

/**
 * Resolves the recording path from `StorageLocation`, `StudyRoot` and
 * `PathTemplate`, first match wins:
 *
 * 1. `StorageLocation`, expanded
 * 2. `StudyRoot` joined with the expanded `PathTemplate`
 * 3. `StudyRoot` with `LabRecorder_<hostname>_<datetime>_eeg.xdf`
 * 4. `PathTemplate`, expanded
 * 5. the fallback filename
 *
 * The result always ends in `.xdf` and has a Windows-safe base name.
 */
export function resolveRecordingFilename(cfg: RawConfigMap, options: ResolveFilenameOptions = {}): string {
  const environment = options.environment ?? defaultEnvironment();
  const studyRoot = readText(cfg, "StudyRoot");
  const storageLocation = readText(cfg, "StorageLocation");
  const pathTemplate = readText(cfg, "PathTemplate");
  const placeholders = buildPlaceholders(cfg, environment);

  let destination: string;
  if (storageLocation) {
    destination = expandTemplate(storageLocation, placeholders);
  } else if (studyRoot && pathTemplate) {
    destination = joinPath(studyRoot, expandTemplate(pathTemplate, placeholders));
  } else if (studyRoot) {
    destination = joinPath(studyRoot, `LabRecorder_${placeholders.hostname}_${placeholders.datetime}_eeg.xdf`);
  } else if (pathTemplate) {
    destination = expandTemplate(pathTemplate, placeholders);
  } else {
    destination = options.fallbackFilename ?? DEFAULT_FILENAME;
  }

  return sanitizeOutputPath(ensureExtension(destination), environment);
}

export function ensureExtension(destination: string): string {
  return destination.toLowerCase().endsWith(RECORDING_EXTENSION) ? destination : `${destination}${RECORDING_EXTENSION}`;
}

function readText(cfg: RawConfigMap, key: string): string {
  const value = cfg.get(key);
  if (value === undefined || isBlankValue(value)) {
    return "";
  }
  return formatConfigValue(value).trim();
}
