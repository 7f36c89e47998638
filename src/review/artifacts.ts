import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export const ARTIFACTS_DIR = "artifacts";

/** Writes `fileName` under `<baseDir>/artifacts`, creating the directory. */
export async function writeArtifact(
  baseDir: string,
  fileName: string,
  content: string,
): Promise<string> {
  const directory = path.join(baseDir, ARTIFACTS_DIR);
  await mkdir(directory, { recursive: true });
  const artifactPath = path.join(directory, fileName);
  await writeFile(artifactPath, content, "utf8");
  return artifactPath;
}
