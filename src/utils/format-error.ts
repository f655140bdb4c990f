import { CatalogError } from "../core/errors.js";

export function formatCliError(error: unknown): string {
  if (!error) {
    return "";
  }

  if (error instanceof CatalogError && error.filepath && !error.message.includes(error.filepath)) {
    return `${error.filepath} - ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}
