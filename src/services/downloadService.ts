import { randomUUID, createHash } from "node:crypto";
import { mkdir, open, rename, rm, stat } from "node:fs/promises";
import path from "node:path";

import { DownloadError, IntegrityError, isAppError, errorMessage } from "../core/errors";
import { formatBytes } from "../utils/formatters";
import { sameHash, sha1OfFile } from "../utils/sha1";
import { applyGithubProxy } from "../utils/urlProxy";
import { createLogger } from "./logService";

const logger = createLogger("downloads");

const fileExists = async (filePath: string) => {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
};

const isReusable = async (destination: string, expectedSha1?: string) => {
  if (!(await fileExists(destination))) {
    return false;
  }
  if (!expectedSha1) {
    return true;
  }
  return sameHash(await sha1OfFile(destination), expectedSha1);
};

const writeBody = async (response: Response, tempPath: string) => {
  const hash = createHash("sha1");
  const handle = await open(tempPath, "w");
  let bytes = 0;
  try {
    if (response.body) {
      for await (const chunk of response.body) {
        hash.update(chunk);
        await handle.write(chunk);
        bytes += chunk.byteLength;
      }
    }
  } finally {
    await handle.close();
  }
  return { sha1: hash.digest("hex"), bytes };
};

/**
 * Downloads `url` to `destination` through a sibling temporary file that is
 * renamed into place once the response and the optional SHA-1 check succeed.
 * An existing destination with the expected hash (or any existing destination
 * when no hash is given) is returned without a request.
 */
export const downloadFile = async (
  url: string,
  destination: string,
  expectedSha1?: string,
): Promise<string> => {
  const target = path.resolve(destination);
  if (await isReusable(target, expectedSha1)) {
    logger.debug(`Archivo ya presente: ${target}`);
    return target;
  }

  const requestUrl = applyGithubProxy(url);
  await mkdir(path.dirname(target), { recursive: true });
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${randomUUID()}.part`,
  );

  try {
    let response: Response;
    try {
      response = await fetch(requestUrl);
    } catch (error) {
      throw new DownloadError(`No se pudo descargar ${url}: ${errorMessage(error)}`, url, undefined, error);
    }
    if (!response.ok) {
      throw new DownloadError(`Descarga fallida (${response.status}): ${url}`, url, response.status);
    }

    const { sha1: actual, bytes } = await writeBody(response, tempPath);
    if (expectedSha1 && !sameHash(actual, expectedSha1)) {
      throw new IntegrityError(`Hash inválido en la descarga de ${url}`, expectedSha1.toLowerCase(), actual);
    }
    await rename(tempPath, target);
    logger.info(`Descargado ${url} -> ${target} (${formatBytes(bytes)})`);
    return target;
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    throw new DownloadError(`No se pudo descargar ${url}: ${errorMessage(error)}`, url, undefined, error);
  } finally {
    await rm(tempPath, { force: true });
  }
};
