import { ArgumentError } from '../error/argumentError.js';

/** Base URLs of the API's deployments, keyed by alias. */
export const ENDPOINTS = {
  us: 'https://api.securevan.com/v4',
  intl: 'https://intlapi.securevan.com/v4',
} as const;

/** Database modes an API key may act in. */
export const MODES = {
  VoterFile: 0,
  MyCampaign: 1,
} as const;

export type EndpointAlias = keyof typeof ENDPOINTS;
export type ModeName = keyof typeof MODES;
export type ModeNumber = (typeof MODES)[ModeName];

/** Environment variable read for the application name. */
export const APP_NAME_ENV = 'VOTEBRIDGE_APP_NAME';
/** Environment variable read for the API key. */
export const API_KEY_ENV = 'VOTEBRIDGE_API_KEY';

const MAX_MODE = Math.max(...Object.values(MODES));

/** A deployment alias (case-insensitive) or a full `http(s)://` base URL. */
export function resolveEndpoint(endpoint: string): string {
  if (endpoint.startsWith('http')) {
    return endpoint;
  }

  const lowered = endpoint.toLowerCase();
  for (const [alias, url] of Object.entries(ENDPOINTS)) {
    if (alias === lowered) {
      return url;
    }
  }

  throw new ArgumentError(
    `Unrecognized endpoint alias ${endpoint} (did you forget "https://"?). Supported aliases are: ${Object.keys(ENDPOINTS).join(', ')}`,
  );
}

/** Checks a mode number is one the API knows. */
function checkModeNumber(mode: number): ModeNumber {
  if (!Number.isInteger(mode)) {
    throw new ArgumentError(`Mode number (${mode}) is not an integer`);
  }

  if (mode < 0) {
    throw new ArgumentError(`Mode number (${mode}) is negative`);
  }

  for (const value of Object.values(MODES)) {
    if (value === mode) {
      return value;
    }
  }

  throw new ArgumentError(`Mode number (${mode}) is too high (expected at most ${MAX_MODE})`);
}

/** A mode name (case-insensitive) or number. */
export function resolveMode(mode: string | number): ModeNumber {
  if (typeof mode === 'number') {
    return checkModeNumber(mode);
  }

  const lowered = mode.toLowerCase();
  for (const [name, value] of Object.entries(MODES)) {
    if (name.toLowerCase() === lowered) {
      return value;
    }
  }

  throw new ArgumentError(`Unrecognized mode "${mode}". Supported modes are: ${Object.keys(MODES).join(', ')}`);
}

/** Name of a mode number. */
export function modeName(mode: ModeNumber): ModeName {
  return mode === MODES.MyCampaign ? 'MyCampaign' : 'VoterFile';
}

/** Credential inputs of the client. */
export interface CredentialOptions {
  appName?: string;
  apiKey?: string;
  mode?: string | number;
  fromEnv?: boolean;
}

/** Credentials ready for Basic auth; `apiKey` always ends in `|<mode>`. */
export interface Credentials {
  appName: string;
  apiKey: string;
  mode: ModeNumber;
}

type Env = Readonly<Record<string, string | undefined>>;

function readEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ArgumentError(`Environment variable ${name} is missing or empty.`);
  }

  return value;
}

/**
 * Resolves the application name, API key and mode from explicit options or the environment.
 *
 * The environment is read when `fromEnv` is set, or when neither `appName` nor `apiKey` is given.
 * The mode is either given or carried by the key as a trailing `|<digit>`, never both.
 *
 * @throws ArgumentError when the credentials are missing or inconsistent.
 */
export function resolveCredentials(options: CredentialOptions, env: Env): Credentials {
  const explicit = Boolean(options.appName) || Boolean(options.apiKey);
  const fromEnv = Boolean(options.fromEnv) || !explicit;

  let appName: string;
  let apiKey: string;
  if (fromEnv) {
    if (explicit) {
      throw new ArgumentError(
        `Neither of appName=${options.appName ?? ''} or apiKey should be specified when fromEnv is true`,
      );
    }

    appName = readEnv(env, APP_NAME_ENV);
    apiKey = readEnv(env, API_KEY_ENV);
  } else {
    if (!options.appName) {
      throw new ArgumentError('appName must be given when fromEnv is not specified.');
    }

    if (!options.apiKey) {
      throw new ArgumentError('apiKey must be given when fromEnv is not specified.');
    }

    appName = options.appName;
    apiKey = options.apiKey;
  }

  const pipes = apiKey.split('|').length - 1;
  if (pipes > 1) {
    throw new ArgumentError(`Expected at most 1 "|" character in API key, found ${pipes}.`);
  }

  if (pipes === 1) {
    if (apiKey.indexOf('|') !== apiKey.length - 2) {
      throw new ArgumentError('Expected "|" character to be second-to-last character in API key.');
    }

    if (options.mode !== undefined) {
      throw new ArgumentError(
        'mode specified but mode already indicated in API key, which contains the "|" character.',
      );
    }

    const digit = apiKey.slice(-1);
    if (!/^\d$/.test(digit)) {
      throw new ArgumentError(`Expected a mode number after "|" in API key, got "${digit}".`);
    }

    return { appName, apiKey, mode: checkModeNumber(Number(digit)) };
  }

  if (options.mode === undefined) {
    throw new ArgumentError('mode must either be specified or be implicit in the given API key.');
  }

  const mode = resolveMode(options.mode);
  return { appName, apiKey: `${apiKey}|${mode}`, mode };
}
