/**
 * Compose file loading: read, parse YAML, validate, normalize.
 */

import { readFile } from "node:fs/promises";

import * as v from "valibot";
import { parseDocument } from "yaml";

import { ConfigurationError } from "@/domains/errors";

import { type ComposeProject, normalizeCompose } from "./normalize";
import { composeFileSchema } from "./schemas";

const formatIssue = (issue: v.BaseIssue<unknown>): string => {
  const path = v.getDotPath(issue);
  return path ? `${path}: ${issue.message}` : issue.message;
};

/**
 * Parse compose YAML text.
 *
 * @param source - Shown in error messages, usually the file path
 * @throws {ConfigurationError} When the YAML or the document is invalid
 */
export const parseCompose = (text: string, source = "compose file"): ComposeProject => {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    throw new ConfigurationError(
      `Invalid YAML in ${source}`,
      document.errors.map((error) => error.message),
    );
  }

  const result = v.safeParse(composeFileSchema, document.toJS());
  if (!result.success) {
    throw new ConfigurationError(`Invalid compose file ${source}`, result.issues.map(formatIssue));
  }

  return normalizeCompose(result.output);
};

/**
 * Read and parse a compose file.
 *
 * @example
 * ```typescript
 * const project = await loadComposeFile("docker-compose.yml");
 * const graph = buildDependencyGraph(project.services, project.edges);
 * ```
 */
export const loadComposeFile = async (path: string): Promise<ComposeProject> => {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read compose file ${path}`, [], error);
  }
  return parseCompose(text, path);
};
