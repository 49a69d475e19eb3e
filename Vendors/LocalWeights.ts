import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { BackendError, errorMessage } from '../Errors';

export interface WeightsSource {
  repo: string;
  file: string;
}

export const LOCAL_WEIGHTS: WeightsSource = {
  repo: 'TheBloke/deepseek-coder-1.3b-instruct-GGUF',
  file: 'deepseek-coder-1.3b-instruct.Q4_K_M.gguf',
};

export type Fetcher = (url: string) => Promise<Response>;

export function weightsUrl(source: WeightsSource): string {
  return `https://huggingface.co/${source.repo}/resolve/main/${source.file}`;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Returns the path of the weights file inside `cacheDir`, downloading it from
 * the Hugging Face hub first when it is missing. The download lands in a
 * `.part` file that is renamed only once complete, so an interrupted fetch is
 * never mistaken for a usable model.
 */
export async function ensureWeights(
  cacheDir: string,
  source: WeightsSource = LOCAL_WEIGHTS,
  fetcher: Fetcher = fetch,
  log: (message: string) => void = () => {},
): Promise<string> {
  const target = path.join(cacheDir, source.file);
  if (await pathExists(target)) {
    return target;
  }

  const url = weightsUrl(source);
  log(`downloading ${source.file} from ${source.repo}`);
  await fs.mkdir(cacheDir, { recursive: true });

  let response: Response;
  try {
    response = await fetcher(url);
  } catch (err) {
    throw new BackendError(`weights download failed: ${errorMessage(err)}`, 'transport', 'local');
  }
  if (!response.ok || !response.body) {
    throw new BackendError(`weights download failed: HTTP ${response.status} for ${url}`, 'transport', 'local');
  }

  const partial = `${target}.part`;
  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(partial));
    await fs.rename(partial, target);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw new BackendError(`weights download failed: ${errorMessage(err)}`, 'transport', 'local');
  }
  return target;
}
