export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConnectionConfig = {
  baseUrl: string;
  token: string;
};

export type ConnectionOverrides = {
  gitlabUrl?: string;
  token?: string;
};

type Environment = Readonly<Record<string, string | undefined>>;

const firstNonEmpty = (...values: ReadonlyArray<string | undefined>): string | undefined =>
  values.map((value) => value?.trim()).find((value): value is string => value !== undefined && value.length > 0);

/**
 * Command-line values win over `REFDELTA_GITLAB_URL` and `REFDELTA_GITLAB_TOKEN`.
 */
export const resolveConnectionConfig = (
  overrides: ConnectionOverrides,
  env: Environment = process.env,
): ConnectionConfig => {
  const baseUrl = firstNonEmpty(overrides.gitlabUrl, env["REFDELTA_GITLAB_URL"]);
  if (baseUrl === undefined) {
    throw new ConfigError("GitLab URL is required (--gitlab-url or REFDELTA_GITLAB_URL)");
  }

  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigError(`GitLab URL is not a valid URL: ${baseUrl}`);
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigError(`GitLab URL must use http or https: ${baseUrl}`);
  }

  const token = firstNonEmpty(overrides.token, env["REFDELTA_GITLAB_TOKEN"]);
  if (token === undefined) {
    throw new ConfigError("GitLab token is required (--token or REFDELTA_GITLAB_TOKEN)");
  }

  return { baseUrl, token };
};

export const parsePositiveInteger = (value: string | undefined, optionName: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed < 1) {
    throw new ConfigError(`${optionName} must be a positive integer, got "${value}"`);
  }

  return parsed;
};

/** Numeric ids stay numbers, everything else is a namespaced project path. */
export const parseRepositoryArgument = (value: string): number | string => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ConfigError("repository must not be empty");
  }

  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed;
};
