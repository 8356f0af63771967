import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { IoError, hasErrorCode } from '../../shared/errors';
import type { AppSettings, LogLevelName, SortBy, SortDirection } from '../../shared/models';
import { Logger } from '../utils/Logger';
import { FileService } from './FileService';

export const SETTINGS_FILE_NAME = 'settings.json';
export const DEFAULT_TOOL_TIMEOUT_MS = 15 * 60 * 1000;

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];
const SORT_KEYS: readonly SortBy[] = ['title', 'artist', 'album', 'downloaded'];
const SORT_DIRECTIONS: readonly SortDirection[] = ['normal', 'reverse'];

export interface SettingsLocation {
  /** Directory holding settings.json. Defaults to `$XDG_CONFIG_HOME/crossplay` or `~/.config/crossplay`. */
  configDir?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigDir(location: SettingsLocation = {}): string {
  if (location.configDir) {
    return path.resolve(location.configDir);
  }
  const env = location.env ?? process.env;
  const home = location.homeDir ?? os.homedir();
  const base = env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.length > 0 ? env.XDG_CONFIG_HOME : path.join(home, '.config');
  return path.join(base, 'crossplay');
}

export function defaultSettings(homeDir: string = os.homedir()): AppSettings {
  return {
    libraryPath: path.join(homeDir, 'Music', 'CrossPlay'),
    stagingPath: path.join(os.tmpdir(), 'crossplay-staging'),
    fetchToolPath: 'yt-dlp',
    transcodeToolPath: 'ffmpeg',
    maxConcurrentJobs: 3,
    toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
    reencodeTrim: false,
    logLevel: 'info',
    sortBy: 'title',
    sortDirection: 'normal'
  };
}

/**
 * Persists application settings as JSON in the user's config directory.
 */
export class SettingsService {
  private readonly logger: Logger;
  private readonly configDir: string;
  private readonly defaults: AppSettings;
  private current: AppSettings;

  public constructor(
    private readonly files: FileService,
    logger: Logger,
    location: SettingsLocation = {}
  ) {
    this.logger = logger.child('SettingsService');
    this.configDir = resolveConfigDir(location);
    this.defaults = defaultSettings(location.homeDir);
    this.current = { ...this.defaults };
  }

  public get settingsPath(): string {
    return path.join(this.configDir, SETTINGS_FILE_NAME);
  }

  /**
   * Loads settings from disk, writing the defaults first when no settings file exists.
   */
  public async load(): Promise<AppSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.settingsPath, 'utf8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw new IoError(`Failed to read settings from ${this.settingsPath}`, { path: this.settingsPath, cause: error });
      }
      this.logger.info(`No settings at ${this.settingsPath}; writing defaults`);
      this.current = { ...this.defaults };
      await this.save();
      return this.getSettings();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Settings file ${this.settingsPath} is not valid JSON; using defaults`, error);
      this.current = { ...this.defaults };
      return this.getSettings();
    }

    this.current = this.normalize(parsed);
    return this.getSettings();
  }

  public getSettings(): AppSettings {
    return { ...this.current };
  }

  /**
   * Validates and applies a partial update, then saves. Invalid values are rejected with a RangeError.
   */
  public async update(changes: Partial<AppSettings>): Promise<AppSettings> {
    const merged = { ...this.current, ...changes };
    const problems = this.validate(merged);
    if (problems.length > 0) {
      throw new RangeError(`Invalid settings: ${problems.join('; ')}`);
    }
    this.current = {
      ...merged,
      libraryPath: path.resolve(merged.libraryPath),
      stagingPath: path.resolve(merged.stagingPath)
    };
    await this.save();
    return this.getSettings();
  }

  /**
   * Ensures the library directory exists and returns it.
   */
  public async ensureLibraryPath(): Promise<string> {
    await this.files.ensureDirectory(this.current.libraryPath);
    return this.current.libraryPath;
  }

  private async save(): Promise<void> {
    await this.files.ensureDirectory(this.configDir);
    await this.ensureLibraryPath();
    const json = `${JSON.stringify(this.current, null, 2)}\n`;
    await this.files.writeFileAtomic(this.settingsPath, Buffer.from(json, 'utf8'));
    this.logger.debug(`Saved settings to ${this.settingsPath}`);
  }

  /**
   * Keeps each recognised, valid field from the file and falls back to defaults for the rest.
   */
  private normalize(value: unknown): AppSettings {
    const result: AppSettings = { ...this.defaults };
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      this.logger.warn('Settings file does not hold an object; using defaults');
      return result;
    }
    const read = (key: keyof AppSettings): unknown => Reflect.get(value, key);

    const stringField = (key: 'libraryPath' | 'stagingPath' | 'fetchToolPath' | 'transcodeToolPath'): void => {
      const field = read(key);
      if (typeof field === 'string' && field.trim().length > 0) {
        result[key] = field;
      } else if (field !== undefined) {
        this.logger.warn(`Ignoring invalid ${key} in settings`);
      }
    };
    stringField('libraryPath');
    stringField('stagingPath');
    stringField('fetchToolPath');
    stringField('transcodeToolPath');

    const maxConcurrentJobs = read('maxConcurrentJobs');
    if (isPositiveInteger(maxConcurrentJobs)) {
      result.maxConcurrentJobs = maxConcurrentJobs;
    } else if (maxConcurrentJobs !== undefined) {
      this.logger.warn('Ignoring invalid maxConcurrentJobs in settings');
    }

    const toolTimeoutMs = read('toolTimeoutMs');
    if (isPositiveInteger(toolTimeoutMs)) {
      result.toolTimeoutMs = toolTimeoutMs;
    } else if (toolTimeoutMs !== undefined) {
      this.logger.warn('Ignoring invalid toolTimeoutMs in settings');
    }

    const reencodeTrim = read('reencodeTrim');
    if (typeof reencodeTrim === 'boolean') {
      result.reencodeTrim = reencodeTrim;
    }

    const logLevel = pickOption(read('logLevel'), LOG_LEVELS);
    if (logLevel) {
      result.logLevel = logLevel;
    }
    const sortBy = pickOption(read('sortBy'), SORT_KEYS);
    if (sortBy) {
      result.sortBy = sortBy;
    }
    const sortDirection = pickOption(read('sortDirection'), SORT_DIRECTIONS);
    if (sortDirection) {
      result.sortDirection = sortDirection;
    }
    return result;
  }

  private validate(settings: AppSettings): string[] {
    const problems: string[] = [];
    for (const key of ['libraryPath', 'stagingPath', 'fetchToolPath', 'transcodeToolPath'] as const) {
      if (typeof settings[key] !== 'string' || settings[key].trim().length === 0) {
        problems.push(`${key} must be a non-empty string`);
      }
    }
    if (!isPositiveInteger(settings.maxConcurrentJobs)) {
      problems.push('maxConcurrentJobs must be a positive integer');
    }
    if (!isPositiveInteger(settings.toolTimeoutMs)) {
      problems.push('toolTimeoutMs must be a positive integer');
    }
    if (!pickOption(settings.logLevel, LOG_LEVELS)) {
      problems.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    if (!pickOption(settings.sortBy, SORT_KEYS)) {
      problems.push(`sortBy must be one of ${SORT_KEYS.join(', ')}`);
    }
    if (!pickOption(settings.sortDirection, SORT_DIRECTIONS)) {
      problems.push(`sortDirection must be one of ${SORT_DIRECTIONS.join(', ')}`);
    }
    if (path.resolve(settings.stagingPath) === path.resolve(settings.libraryPath)) {
      problems.push('stagingPath must differ from libraryPath');
    }
    return problems;
  }
}

/**
 * Turns a `key value` pair typed by the user into a settings update. Values are checked by `update`.
 */
export function parseSettingAssignment(key: string, value: string): Partial<AppSettings> {
  switch (key) {
    case 'libraryPath':
      return { libraryPath: value };
    case 'stagingPath':
      return { stagingPath: value };
    case 'fetchToolPath':
      return { fetchToolPath: value };
    case 'transcodeToolPath':
      return { transcodeToolPath: value };
    case 'maxConcurrentJobs':
      return { maxConcurrentJobs: Number(value) };
    case 'toolTimeoutMs':
      return { toolTimeoutMs: Number(value) };
    case 'reencodeTrim':
      if (value !== 'true' && value !== 'false') {
        throw new RangeError('reencodeTrim must be true or false');
      }
      return { reencodeTrim: value === 'true' };
    case 'logLevel': {
      const logLevel = pickOption(value, LOG_LEVELS);
      if (!logLevel) {
        throw new RangeError(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
      }
      return { logLevel };
    }
    case 'sortBy': {
      const sortBy = pickOption(value, SORT_KEYS);
      if (!sortBy) {
        throw new RangeError(`sortBy must be one of ${SORT_KEYS.join(', ')}`);
      }
      return { sortBy };
    }
    case 'sortDirection': {
      const sortDirection = pickOption(value, SORT_DIRECTIONS);
      if (!sortDirection) {
        throw new RangeError(`sortDirection must be one of ${SORT_DIRECTIONS.join(', ')}`);
      }
      return { sortDirection };
    }
    default:
      throw new RangeError(`Unknown setting "${key}"`);
  }
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function pickOption<T extends string>(value: unknown, options: readonly T[]): T | undefined {
  return options.find((option) => option === value);
}
