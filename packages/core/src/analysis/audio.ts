import fs from "fs";
import os from "os";
import path from "path";
import { PipelineError, errorMessage } from "../errors";

/**
 * Downloads `url` into a private temp directory, hands the file path to `fn`,
 * and removes the directory however `fn` exits.
 */
export async function withTempAudioFile<T>(
  url: string,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  let res: Response;
  try {
    res = await fetch(url);
  } catch (err) {
    throw new PipelineError("download", `Audio download failed: ${errorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new PipelineError("download", `Audio download returned ${res.status} for ${url}`);
  }

  const bytes = Buffer.from(await res.arrayBuffer());
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "viral-call-"));
  const filePath = path.join(dir, "call.mp3");

  try {
    await fs.promises.writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
