/**
 * Zip Deploy Artifacts
 *
 * A deploy path is either a folder that must be archived first or an
 * existing .zip archive. Folders are archived beside themselves (or into a
 * chosen target folder) as `<folder name>.zip`.
 */

import { rmSync, statSync, type Stats } from "node:fs";
import { basename, dirname, extname, join, resolve } from "node:path";
import AdmZip from "adm-zip";
import { ArtifactClassificationError, OperationCancelledError } from "../core/errors.js";

export type ZipDeployArtifact =
  | { kind: "folder"; path: string }
  | { kind: "archive"; path: string };

/**
 * Classify a path. Directories are folders; files with a `.zip` extension
 * (case-sensitive) are archives; anything else is rejected.
 */
export function classifyArtifact(path: string): ZipDeployArtifact {
  const stats = statPath(path);
  if (stats.isDirectory()) return { kind: "folder", path };
  if (stats.isFile() && extname(path) === ".zip") return { kind: "archive", path };
  throw new ArtifactClassificationError(path);
}

function statPath(path: string): Stats {
  try {
    return statSync(path);
  } catch (err) {
    throw new ArtifactClassificationError(path, { cause: err });
  }
}

/** Where a folder artifact will be archived to. */
export function archivePathFor(folder: string, targetFolder?: string): string {
  const source = resolve(folder);
  return join(targetFolder ?? dirname(source), `${basename(source)}.zip`);
}

/**
 * Return the path of a zip file for the artifact, archiving folders first.
 * Any stale archive at the destination is deleted before the new one is written.
 */
export function materializeArtifact(artifact: ZipDeployArtifact, targetFolder?: string, signal?: AbortSignal): string {
  if (artifact.kind === "archive") return artifact.path;

  const destination = archivePathFor(artifact.path, targetFolder);
  rmSync(destination, { force: true });

  if (signal?.aborted) {
    throw new OperationCancelledError(`Archiving ${artifact.path}`);
  }

  const zip = new AdmZip();
  zip.addLocalFolder(artifact.path);
  zip.writeZip(destination);
  return destination;
}

/** Classify and materialize in one step. */
export function resolveZipPath(path: string, targetFolder?: string, signal?: AbortSignal): string {
  return materializeArtifact(classifyArtifact(path), targetFolder, signal);
}
