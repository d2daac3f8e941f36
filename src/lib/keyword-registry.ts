import { DirectoryCache } from './directory-cache';
import { KeywordStore } from './config-store';
import { isDirectory } from '../utils/file-utils';
import { Logger, createLogger } from '../utils/logger';

/** Expands to every album on the device at read time */
export const ALL_ALBUMS = 'ALLALBUMS';

/** Images placed directly inside the content directory */
export const ROOT_IMAGES = '_PHOTOFRAME_';

export interface KeywordValidation {
  valid: boolean;
  keyword: string;
  error?: string;
}

export interface KeywordRegistryOptions {
  store: KeywordStore;
  cache: DirectoryCache;
  contentRoot: string;
  contentDirName?: string;
  logger?: Logger;
}

function unique(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}

/**
 * Album keywords for the content directory. Albums are its subdirectories;
 * matching is case-sensitive.
 */
export class KeywordRegistry {
  private readonly store: KeywordStore;
  private readonly cache: DirectoryCache;
  private readonly contentRoot: string;
  private readonly contentDirName: string;
  private readonly logger: Logger;

  constructor(options: KeywordRegistryOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.contentRoot = options.contentRoot;
    this.contentDirName = options.contentDirName ?? 'photoframe';
    this.logger = options.logger ?? createLogger('Keyword Registry');
  }

  /**
   * Album names, newest first
   */
  async albumNames(): Promise<string[]> {
    return this.cache.dirNames(this.contentRoot);
  }

  /**
   * Files directly inside the content directory, newest first
   */
  async rootImageNames(): Promise<string[]> {
    return this.cache.fileNames(this.contentRoot);
  }

  /**
   * Stored keywords with ALLALBUMS expanded. Seeds _PHOTOFRAME_ when nothing
   * else would be shown but the content directory holds images itself.
   */
  async list(): Promise<string[]> {
    if (!(await isDirectory(this.contentRoot))) {
      return [];
    }

    const stored = unique(await this.store.loadKeywords());
    const keywords = stored.filter((keyword) => keyword !== ALL_ALBUMS);

    if (stored.includes(ALL_ALBUMS)) {
      const albums = await this.albumNames();
      if (albums.includes(ALL_ALBUMS)) {
        this.logger.error(`An album must not be called '${ALL_ALBUMS}', ignoring it`);
      }
      for (const album of albums) {
        if (album !== ALL_ALBUMS && !keywords.includes(album)) {
          keywords.push(album);
        }
      }
    }

    if (keywords.length === 0 && (await this.rootImageNames()).length > 0) {
      keywords.push(ROOT_IMAGES);
      await this.store.saveKeywords([...stored, ROOT_IMAGES]);
    }

    return keywords;
  }

  async validate(keyword: string): Promise<KeywordValidation> {
    if (keyword === ALL_ALBUMS || keyword === ROOT_IMAGES) {
      return { valid: true, keyword };
    }

    const albums = await this.albumNames();
    if (!albums.includes(keyword)) {
      return { valid: false, keyword, error: `No such album "${keyword}"` };
    }
    return { valid: true, keyword };
  }

  /**
   * Validate and store a keyword. Storing an existing keyword is a no-op.
   */
  async add(rawKeyword: string): Promise<KeywordValidation> {
    const keyword = rawKeyword.trim();
    if (keyword === '') {
      return { valid: false, keyword, error: 'Keyword cannot be empty' };
    }

    const validation = await this.validate(keyword);
    if (!validation.valid) {
      return validation;
    }

    const stored = await this.store.loadKeywords();
    if (!stored.includes(keyword)) {
      await this.store.saveKeywords([...stored, keyword]);
    }
    return validation;
  }

  /**
   * Remove the stored keyword at `index`
   */
  async remove(index: number): Promise<boolean> {
    const stored = await this.store.loadKeywords();
    if (!Number.isInteger(index) || index < 0 || index >= stored.length) {
      return false;
    }
    stored.splice(index, 1);
    await this.store.saveKeywords(stored);
    return true;
  }

  /**
   * Drop stored keywords that no longer match the content directory.
   * Skipped while the content directory is absent, so unplugging a device
   * does not wipe the keyword list.
   * @returns the removed keywords
   */
  async reconcile(): Promise<string[]> {
    if (!(await isDirectory(this.contentRoot))) {
      return [];
    }

    const stored = await this.store.loadKeywords();
    const albums = await this.albumNames();
    const hasRootImages = (await this.rootImageNames()).length > 0;

    const removed: string[] = [];
    const kept = stored.filter((keyword) => {
      if (keyword === ALL_ALBUMS) {
        return true;
      }
      if (keyword === ROOT_IMAGES) {
        if (hasRootImages) return true;
        this.logger.debug(
          `Removing keyword '${keyword}' because there are no images directly inside ${this.contentRoot}`
        );
      } else if (albums.includes(keyword)) {
        return true;
      } else {
        this.logger.info(`Removing invalid keyword: ${keyword}`);
      }
      removed.push(keyword);
      return false;
    });

    if (removed.length > 0) {
      await this.store.saveKeywords(kept);
    }
    return removed;
  }

  helpText(): string {
    const dir = this.contentDirName;
    return (
      `Place photo albums in /${dir}/{album_name} on your usb-device.\n` +
      `Use the {album_name} as keyword (CasE-seNsitiVe!).\n` +
      `If you want to display all albums simply write '${ALL_ALBUMS}' as keyword.\n` +
      `Alternatively, place images directly inside the '/${dir}/' directory.`
    );
  }
}
