import fs from 'node:fs/promises';
import NodeID3 from 'node-id3';
import { CorruptTagError, IoError } from '../../shared/errors';
import { PROVENANCE_KEYS, type Provenance, type TagEdit, type TagSet, type TagStatus } from '../../shared/models';
import { Logger } from '../utils/Logger';
import { FileService } from './FileService';
import { decodeProvenance, encodeProvenance, mergeProvenance } from './ProvenanceCodec';

const ID3_HEADER_SIZE = 10;
const COMMENT_LANGUAGE = 'eng';
/** Description of the comment frame that carries provenance; other comments belong to other tools. */
export const PROVENANCE_COMMENT_DESCRIPTION = 'CrossPlay';
const TEXT_FIELDS = ['title', 'artist', 'album', 'year', 'genre'] as const;

type TextField = (typeof TEXT_FIELDS)[number];

export interface TagReadResult {
  tags: TagSet;
  status: TagStatus;
}

export function emptyTagSet(): TagSet {
  return { provenance: {} };
}

/**
 * Applies a user edit: strings replace, `null` clears, omitted fields stay. Provenance entries are merged
 * and the song is marked as edited.
 */
export function applyTagEdit(current: TagSet, edit: TagEdit): TagSet {
  const next: TagSet = { ...current, provenance: { ...current.provenance } };
  for (const field of TEXT_FIELDS) {
    const value = edit[field];
    if (value === null) {
      delete next[field];
    } else if (value !== undefined) {
      next[field] = value;
    }
  }
  next.provenance = mergeProvenance(current.provenance, {
    ...edit.provenance,
    [PROVENANCE_KEYS.metadataEdited]: 'true'
  });
  return next;
}

/**
 * Reads and writes the ID3 block of MP3 files, including the provenance comment.
 */
export class TagService {
  private readonly logger: Logger;

  public constructor(
    private readonly files: FileService,
    logger: Logger
  ) {
    this.logger = logger.child('TagService');
  }

  /**
   * Reads the embedded tags. Files without an ID3 block read as an empty tag set.
   * Throws CorruptTagError when the block is malformed and IoError when the file cannot be read.
   */
  public async readTags(filePath: string): Promise<TagReadResult> {
    const buffer = await this.readFile(filePath);
    return this.parseBuffer(buffer, filePath);
  }

  /**
   * Like {@link readTags}, but treats a corrupt tag block as empty metadata.
   */
  public async readTagsOrEmpty(filePath: string): Promise<TagReadResult> {
    try {
      return await this.readTags(filePath);
    } catch (error) {
      if (error instanceof CorruptTagError) {
        this.logger.warn(`Treating unreadable tags as empty: ${filePath}`, error.message);
        return { tags: emptyTagSet(), status: 'corrupt' };
      }
      throw error;
    }
  }

  /**
   * Replaces the tag fields of a file in place. Frames the tag set does not describe (cover art, etc.) are kept.
   * Written through a temp file and a rename, so the canonical path never holds a half-written file.
   */
  public async writeTags(filePath: string, tags: TagSet): Promise<void> {
    await this.writeTagsTo(filePath, filePath, tags);
  }

  /**
   * Reads the audio of `sourcePath` and writes it, tagged, to `targetPath`.
   */
  public async writeTagsTo(sourcePath: string, targetPath: string, tags: TagSet): Promise<void> {
    const buffer = await this.readFile(sourcePath);
    const tagged = this.buildTaggedBuffer(buffer, tags, sourcePath);
    await this.files.writeFileAtomic(targetPath, tagged);
    this.logger.debug(`Wrote tags to ${targetPath}`, {
      title: tags.title ?? null,
      provenance: encodeProvenance(tags.provenance)
    });
  }

  private parseBuffer(buffer: Buffer, filePath: string): TagReadResult {
    if (!this.hasId3Header(buffer)) {
      return { tags: emptyTagSet(), status: 'missing' };
    }
    this.assertHeaderIsValid(buffer, filePath);

    let raw: NodeID3.Tags;
    try {
      raw = NodeID3.read(buffer, { noRaw: true });
    } catch (error) {
      throw new CorruptTagError(`Failed to parse ID3 frames in ${filePath}`, { path: filePath, cause: error });
    }

    const tags: TagSet = { provenance: this.readProvenance(raw) };
    for (const field of TEXT_FIELDS) {
      const value = this.readTextField(raw, field);
      if (value !== undefined) {
        tags[field] = value;
      }
    }
    return { tags, status: 'ok' };
  }

  private readTextField(raw: NodeID3.Tags, field: TextField): string | undefined {
    const value = raw[field];
    if (typeof value !== 'string') {
      return undefined;
    }
    const trimmed = stripNul(value).trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  /**
   * Absent, empty or foreign comments yield an empty map rather than failing the read.
   */
  private readProvenance(raw: NodeID3.Tags): Provenance {
    const comment = raw.comment;
    if (!comment || !isProvenanceComment(comment)) {
      return {};
    }
    return decodeProvenance(stripNul(comment.text)) ?? {};
  }

  /**
   * Builds the new file contents. A corrupt tag block is dropped and replaced by a fresh one, since its
   * frames cannot be carried over.
   */
  private buildTaggedBuffer(buffer: Buffer, tags: TagSet, filePath: string): Buffer {
    const { existing, audio } = this.splitExistingTags(buffer, filePath);

    const next: NodeID3.Tags = { ...existing };
    for (const field of TEXT_FIELDS) {
      const value = tags[field];
      if (value !== undefined && value.trim().length > 0) {
        next[field] = value.trim();
      } else {
        delete next[field];
      }
    }

    // node-id3 keeps a single comment frame, so provenance takes the slot when there is any to write.
    const provenanceText = encodeProvenance(tags.provenance);
    const existingComment = existing.comment;
    const existingIsOurs = existingComment !== undefined && isProvenanceComment(existingComment);
    if (provenanceText.length > 0) {
      if (existingComment && !existingIsOurs) {
        this.logger.warn(`Replacing foreign comment in ${filePath}`);
      }
      next.comment = { language: COMMENT_LANGUAGE, shortText: PROVENANCE_COMMENT_DESCRIPTION, text: provenanceText };
    } else if (existingIsOurs) {
      delete next.comment;
    }

    const written: unknown = NodeID3.write(next, audio);
    if (!Buffer.isBuffer(written)) {
      throw new IoError(`Failed to encode ID3 tags for ${filePath}`, {
        path: filePath,
        cause: written instanceof Error ? written : undefined
      });
    }
    return written;
  }

  private splitExistingTags(buffer: Buffer, filePath: string): { existing: NodeID3.Tags; audio: Buffer } {
    if (!this.hasId3Header(buffer)) {
      return { existing: {}, audio: buffer };
    }
    try {
      this.assertHeaderIsValid(buffer, filePath);
      return { existing: NodeID3.read(buffer, { noRaw: true }), audio: buffer };
    } catch (error) {
      this.logger.warn(`Replacing unreadable tag block in ${filePath}`, error instanceof Error ? error.message : error);
      return { existing: {}, audio: buffer.subarray(this.corruptBlockEnd(buffer)) };
    }
  }

  /**
   * Offset where the audio after a damaged block starts: the declared block end when the size field is
   * usable, otherwise just past the header.
   */
  private corruptBlockEnd(buffer: Buffer): number {
    if (buffer.length < ID3_HEADER_SIZE) {
      return buffer.length;
    }
    let size = 0;
    for (let index = 6; index < ID3_HEADER_SIZE; index += 1) {
      const byte = buffer[index] ?? 0;
      if (byte >= 0x80) {
        return ID3_HEADER_SIZE;
      }
      size = size * 128 + byte;
    }
    return ID3_HEADER_SIZE + size <= buffer.length ? ID3_HEADER_SIZE + size : ID3_HEADER_SIZE;
  }

  private hasId3Header(buffer: Buffer): boolean {
    return buffer.length >= 3 && buffer.toString('latin1', 0, 3) === 'ID3';
  }

  /**
   * Validates the 10-byte ID3v2 header: supported major version and a syncsafe size that fits in the file.
   */
  private assertHeaderIsValid(buffer: Buffer, filePath: string): void {
    if (buffer.length < ID3_HEADER_SIZE) {
      throw new CorruptTagError(`Truncated ID3 header in ${filePath}`, { path: filePath });
    }
    const majorVersion = buffer[3] ?? 0;
    const revision = buffer[4] ?? 0xff;
    if (majorVersion < 2 || majorVersion > 4 || revision === 0xff) {
      throw new CorruptTagError(`Unsupported ID3 version 2.${majorVersion} in ${filePath}`, { path: filePath });
    }
    let size = 0;
    for (let index = 6; index < ID3_HEADER_SIZE; index += 1) {
      const byte = buffer[index] ?? 0;
      if (byte >= 0x80) {
        throw new CorruptTagError(`Invalid ID3 size field in ${filePath}`, { path: filePath });
      }
      size = size * 128 + byte;
    }
    if (ID3_HEADER_SIZE + size > buffer.length) {
      throw new CorruptTagError(`ID3 block overruns ${filePath}`, { path: filePath });
    }
  }

  private async readFile(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new IoError(`Failed to read ${filePath}`, { path: filePath, cause: error });
    }
  }
}

function stripNul(value: string): string {
  return value.replace(/\u0000+$/g, '');
}

function isProvenanceComment(comment: { shortText?: string }): boolean {
  return stripNul(comment.shortText ?? '').trim() === PROVENANCE_COMMENT_DESCRIPTION;
}
