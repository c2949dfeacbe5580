import { ArtifactKind } from '../interfaces/Artifacts';

export const CLUSTER_FILE_NAME = 'postgres_cluster.sql.gz';
export const GLOBALS_FILE_NAME = 'postgres_globals.sql.gz';
export const ARTIFACT_EXTENSION = '.sql.gz';

const DATABASE_PREFIX = 'postgres_db_';
const FOLDER_ID_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format the cycle start instant as YYYYMMDD_HHMMSS in local time
 */
export function folderName(instant: Date): string {
  const date = `${String(instant.getFullYear()).padStart(4, '0')}${pad(instant.getMonth() + 1)}${pad(instant.getDate())}`;
  const time = `${pad(instant.getHours())}${pad(instant.getMinutes())}${pad(instant.getSeconds())}`;
  return `${date}_${time}`;
}

export function isFolderId(name: string): boolean {
  return FOLDER_ID_PATTERN.test(name);
}

/**
 * Local midnight of a calendar date; setFullYear keeps years 0-99 literal
 */
function localDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setFullYear(year, monthIndex, day);
  date.setHours(0, 0, 0, 0);
  return date;
}

function daysInMonth(year: number, month: number): number {
  return localDate(year, month, 0).getDate();
}

/**
 * Parse a folder id back into the local instant it names.
 * Returns null unless every component is calendar-valid.
 */
export function parseTimestamp(folderId: string): Date | null {
  const match = FOLDER_ID_PATTERN.exec(folderId);
  if (!match) {
    return null;
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const instant = localDate(year, month - 1, day);
  instant.setHours(hours, minutes, seconds);
  return instant;
}

export function artifactFileName(kind: ArtifactKind): string {
  switch (kind.type) {
    case 'cluster':
      return CLUSTER_FILE_NAME;
    case 'globals':
      return GLOBALS_FILE_NAME;
    case 'database':
      // Database names are used verbatim; a name containing '/' escapes the folder
      return `${DATABASE_PREFIX}${kind.name}${ARTIFACT_EXTENSION}`;
  }
}

export function parseDatabaseName(fileName: string): string | null {
  if (!fileName.startsWith(DATABASE_PREFIX) || !fileName.endsWith(ARTIFACT_EXTENSION)) {
    return null;
  }

  const name = fileName.slice(DATABASE_PREFIX.length, fileName.length - ARTIFACT_EXTENSION.length);
  return name.length > 0 ? name : null;
}

export function parseArtifactKind(fileName: string): ArtifactKind | null {
  if (fileName === CLUSTER_FILE_NAME) {
    return { type: 'cluster' };
  }
  if (fileName === GLOBALS_FILE_NAME) {
    return { type: 'globals' };
  }

  const name = parseDatabaseName(fileName);
  return name === null ? null : { type: 'database', name };
}

export function isArtifactFile(fileName: string): boolean {
  return fileName.endsWith(ARTIFACT_EXTENSION);
}
