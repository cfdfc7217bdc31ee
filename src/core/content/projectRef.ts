import { ValidationError } from "../errors";
import type { ModSource, ProjectRef } from "./types";

export const CURSEFORGE_PREFIX = "cf-";

const parseCurseforgeNumber = (raw: string, original: string) => {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`Identificador de CurseForge inválido: ${original}`);
  }
  return Number(raw);
};

export const sourceOf = (id: string): ModSource =>
  id.startsWith(CURSEFORGE_PREFIX) ? "curseforge" : "modrinth";

export const parseProjectRef = (id: string): ProjectRef => {
  const trimmed = id.trim();
  if (!trimmed) {
    throw new ValidationError("Identificador de proyecto vacío.");
  }
  if (sourceOf(trimmed) === "curseforge") {
    return {
      source: "curseforge",
      id: parseCurseforgeNumber(trimmed.slice(CURSEFORGE_PREFIX.length), trimmed),
    };
  }
  return { source: "modrinth", id: trimmed };
};

// Version ids share the project id convention: `cf-<fileId>` or a native id.
export const parseVersionRef = parseProjectRef;

export const formatProjectRef = (ref: ProjectRef) =>
  ref.source === "curseforge" ? `${CURSEFORGE_PREFIX}${ref.id}` : ref.id;

export const curseforgeId = (id: number) => `${CURSEFORGE_PREFIX}${id}`;

export const requireCurseforgeId = (id: string) => {
  const ref = parseProjectRef(id);
  if (ref.source !== "curseforge") {
    throw new ValidationError(`El identificador ${id} no pertenece a CurseForge.`);
  }
  return ref.id;
};
