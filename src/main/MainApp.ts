import path from 'node:path';
import type { AppSettings, LibraryScanSummary } from '../shared/models';
import {
  FfmpegTranscodeTool,
  YtDlpFetchTool,
  createMusicMetadataProbe,
  type DurationProbe,
  type FetchTool,
  type TranscodeTool
} from './services/ExternalTools';
import { FileService } from './services/FileService';
import { LibraryService } from './services/LibraryService';
import { SettingsService, type SettingsLocation } from './services/SettingsService';
import { Logger } from './utils/Logger';

export interface MainAppOptions extends SettingsLocation {
  /** Applied on top of the stored settings for this session only. */
  overrides?: Partial<AppSettings>;
  logger?: Logger;
  fetchTool?: FetchTool;
  transcodeTool?: TranscodeTool;
  probeDuration?: DurationProbe;
}

/**
 * Wires settings, tools and the library engine together.
 */
export class MainApp {
  public readonly logger: Logger;
  private readonly files: FileService;
  private readonly settingsService: SettingsService;
  private library: LibraryService | null = null;
  private sessionSettings: AppSettings | null = null;

  public constructor(private readonly options: MainAppOptions = {}) {
    this.logger = options.logger ?? Logger.create();
    this.files = new FileService(this.logger);
    this.settingsService = new SettingsService(this.files, this.logger, options);
  }

  public async initialize(): Promise<LibraryScanSummary> {
    const stored = await this.settingsService.load();
    const settings: AppSettings = { ...stored, ...this.options.overrides };
    this.sessionSettings = settings;
    this.logger.setLevel(settings.logLevel);
    this.logger.info(`Library: ${settings.libraryPath}`);

    this.library = new LibraryService({
      settings,
      logger: this.logger,
      files: this.files,
      fetchTool: this.options.fetchTool ?? new YtDlpFetchTool(settings.fetchToolPath, settings.toolTimeoutMs, this.logger),
      transcodeTool:
        this.options.transcodeTool ?? new FfmpegTranscodeTool(settings.transcodeToolPath, settings.toolTimeoutMs, this.logger),
      probeDuration: this.options.probeDuration ?? createMusicMetadataProbe(this.logger)
    });
    return this.library.initialize();
  }

  public get engine(): LibraryService {
    if (!this.library) {
      throw new Error('MainApp has not been initialised');
    }
    return this.library;
  }

  public get settings(): SettingsService {
    return this.settingsService;
  }

  /** Settings in effect for this session, including overrides. */
  public get activeSettings(): AppSettings {
    return this.sessionSettings ?? this.settingsService.getSettings();
  }

  /**
   * Resolves a user-supplied song path: as given relative to the working directory when that exists,
   * otherwise as a file name inside the library.
   */
  public async resolveSongPath(input: string): Promise<string> {
    const direct = path.resolve(input);
    if (await this.files.pathExists(direct)) {
      return direct;
    }
    return path.join(this.activeSettings.libraryPath, input);
  }

  /**
   * Initialises, runs `task` with the startup scan and always disposes.
   */
  public async run(task: (startup: LibraryScanSummary) => Promise<void>): Promise<void> {
    try {
      const startup = await this.initialize();
      await task(startup);
    } finally {
      await this.dispose();
    }
  }

  public async dispose(): Promise<void> {
    if (this.library) {
      await this.library.dispose();
      this.library = null;
    }
  }
}
