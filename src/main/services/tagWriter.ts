/**
 * Tag Writer Service
 *
 * Writes artist, title and release metadata to audio file tags.
 *
 * Key design decisions:
 * - Uses `node-id3` for MP3 ID3v2 tags (update mode preserves existing frames)
 * - WAV files carry the same ID3v2 tag inside a RIFF "id3 " chunk
 * - FLAC and Ogg Vorbis comments, MP4 ilst atoms and ASF content
 *   descriptions are rewritten with plain Buffer manipulation; no audio data
 *   is re-encoded
 * - Fields missing from the input are left untouched in the file
 * - Writers never throw; failures come back as WriteTagsResult
 */

import * as fs from 'fs';
import * as path from 'path';
import NodeID3 from 'node-id3';
import type { AudioFormat } from '../../shared/types';
import { errorMessage } from './errors';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Metadata fields that can be written to an audio file */
export interface WriteTagsInput {
  /** Song title */
  title?: string;
  /** Primary artist name */
  artist?: string;
  /** Release year */
  year?: number;
  /** Genre, already combined into a single string */
  genre?: string;
  /** Record label */
  label?: string;
}

/** Result of a tag write operation */
export interface WriteTagsResult {
  /** Whether the write was successful */
  success: boolean;
  /** The file path (unchanged) */
  filePath: string;
  /** Error message if write failed */
  error: string | null;
}

// ─── Format Detection ─────────────────────────────────────────────────────────

const ALL_FORMATS: readonly AudioFormat[] = ['mp3', 'flac', 'ogg', 'm4a', 'mp4', 'wma', 'wav'];

function isAudioFormat(value: string): value is AudioFormat {
  return ALL_FORMATS.some((format) => format === value);
}

/**
 * Gets the audio format from a file extension.
 * @param filePath - Path to the audio file
 * @returns The audio format or null if unsupported
 */
export function getFormatFromPath(filePath: string): AudioFormat | null {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return isAudioFormat(ext) ? ext : null;
}

// ─── ID3 Tag Building ─────────────────────────────────────────────────────────

/**
 * Builds a node-id3 compatible tag object from our WriteTagsInput.
 * @param input - The metadata fields to write
 * @returns A node-id3 Tags object ready for writing
 */
export function buildId3Tags(input: WriteTagsInput): NodeID3.Tags {
  const tags: NodeID3.Tags = {};

  if (input.title !== undefined) {
    tags.title = input.title;
  }

  if (input.artist !== undefined) {
    tags.artist = input.artist;
  }

  if (input.year !== undefined) {
    tags.year = String(input.year);
  }

  if (input.genre !== undefined) {
    tags.genre = input.genre;
  }

  if (input.label !== undefined) {
    tags.publisher = input.label;
  }

  return tags;
}

// ─── Read-only Helper ─────────────────────────────────────────────────────────

/**
 * Runs a write with the owner-write bit set. A read-only file gets its mode
 * back afterwards; if that fails the result is a failure even when the tags
 * were written.
 *
 * On Windows Node maps the owner-write bit onto FILE_ATTRIBUTE_READONLY, so
 * the same chmod clears the read-only attribute there.
 */
function withWritableFile(filePath: string, failure: string, write: () => void): WriteTagsResult {
  let originalMode: number | null = null;
  let error: string | null = null;

  try {
    const mode = fs.statSync(filePath).mode & 0o777;
    if ((mode & 0o200) === 0) {
      fs.chmodSync(filePath, mode | 0o200);
      originalMode = mode;
    }
    write();
  } catch (writeError: unknown) {
    error = `${failure}: ${errorMessage(writeError)}`;
  }

  if (originalMode !== null) {
    try {
      fs.chmodSync(filePath, originalMode);
    } catch (restoreError: unknown) {
      if (error === null) {
        error = `Tags written but read-only mode not restored: ${errorMessage(restoreError)}`;
      }
    }
  }

  return { success: error === null, filePath, error };
}

/**
 * Checks that a file exists and has one of the expected formats.
 * @returns An error message, or null if the file can be written
 */
function checkTarget(filePath: string, expected: readonly AudioFormat[], writer: string): string | null {
  if (!fs.existsSync(filePath)) {
    return `File not found: ${filePath}`;
  }
  const format = getFormatFromPath(filePath);
  if (format === null || !expected.includes(format)) {
    return `${writer} only supports ${expected.map((f) => f.toUpperCase()).join('/')} files, got: ${format ?? 'unknown'}`;
  }
  return null;
}

/**
 * Reads a file, transforms its bytes and writes the result back in place.
 * Read-only files are made writable for the duration of the write.
 */
function rewriteFile(
  filePath: string,
  expected: readonly AudioFormat[],
  writer: string,
  transform: (fileData: Buffer) => Buffer,
): WriteTagsResult {
  const invalid = checkTarget(filePath, expected, writer);
  if (invalid) {
    return { success: false, filePath, error: invalid };
  }

  return withWritableFile(filePath, `Failed to write ${expected[0].toUpperCase()} tags`, () => {
    fs.writeFileSync(filePath, transform(fs.readFileSync(filePath)));
  });
}

// ─── MP3 Tag Writing ──────────────────────────────────────────────────────────

/**
 * Writes ID3 tags to an MP3 file in update mode (existing frames that are
 * not being written are preserved).
 *
 * @param filePath - Absolute path to the MP3 file
 * @param input - Metadata fields to write
 */
export function writeMp3Tags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  const invalid = checkTarget(filePath, ['mp3'], 'writeMp3Tags');
  if (invalid) {
    return { success: false, filePath, error: invalid };
  }

  return withWritableFile(filePath, 'Failed to write ID3 tags', () => {
    const result = NodeID3.update(buildId3Tags(input), filePath);
    if (result instanceof Error) throw result;
  });
}

// ─── WAV Tag Writing ──────────────────────────────────────────────────────────

interface RiffChunk {
  id: string;
  data: Buffer;
}

/** Parses the chunks of a RIFF/WAVE file (everything after the 12-byte header). */
export function parseRiffChunks(fileData: Buffer): RiffChunk[] {
  if (
    fileData.length < 12 ||
    fileData.toString('ascii', 0, 4) !== 'RIFF' ||
    fileData.toString('ascii', 8, 12) !== 'WAVE'
  ) {
    throw new Error('Not a valid WAV file (missing RIFF/WAVE header)');
  }

  const chunks: RiffChunk[] = [];
  let offset = 12;
  while (offset + 8 <= fileData.length) {
    const id = fileData.toString('ascii', offset, offset + 4);
    const size = fileData.readUInt32LE(offset + 4);
    const start = offset + 8;
    if (start + size > fileData.length) throw new Error(`Truncated WAV chunk: ${id}`);
    chunks.push({ id, data: Buffer.from(fileData.subarray(start, start + size)) });
    // Chunks are word-aligned
    offset = start + size + (size % 2);
  }
  return chunks;
}

/** Serialises RIFF chunks back into a complete WAVE file. */
function serializeRiffChunks(chunks: RiffChunk[]): Buffer {
  const parts: Buffer[] = [];
  for (const chunk of chunks) {
    const header = Buffer.alloc(8);
    header.write(chunk.id, 0, 4, 'ascii');
    header.writeUInt32LE(chunk.data.length, 4);
    parts.push(header, chunk.data);
    if (chunk.data.length % 2 === 1) parts.push(Buffer.alloc(1));
  }
  const body = Buffer.concat(parts);

  const riffHeader = Buffer.alloc(12);
  riffHeader.write('RIFF', 0, 4, 'ascii');
  riffHeader.writeUInt32LE(body.length + 4, 4);
  riffHeader.write('WAVE', 8, 4, 'ascii');
  return Buffer.concat([riffHeader, body]);
}

function isId3Chunk(chunk: RiffChunk): boolean {
  return chunk.id.toLowerCase() === 'id3 ';
}

/**
 * Writes an ID3v2 tag into the "id3 " chunk of a WAV file. Frames already in
 * an existing chunk are preserved unless overwritten.
 */
export function writeWavTags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  return rewriteFile(filePath, ['wav'], 'writeWavTags', (fileData) => {
    const chunks = parseRiffChunks(fileData);
    const existing = chunks.find(isId3Chunk);
    const tag = NodeID3.update(buildId3Tags(input), existing?.data ?? Buffer.alloc(0));

    const updated = chunks.filter((chunk) => !isId3Chunk(chunk));
    updated.push({ id: 'id3 ', data: tag });
    return serializeRiffChunks(updated);
  });
}

// ─── FLAC Tag Writing ─────────────────────────────────────────────────────────

// FLAC block type constants
const FLAC_MAGIC = 'fLaC';
const FLAC_BLOCK_TYPE_VORBIS_COMMENT = 4;
const FLAC_BLOCK_TYPE_PADDING = 1;
const VORBIS_VENDOR = 'tagsmith';

interface FlacBlock {
  type: number;
  data: Buffer;
}

/** Parses FLAC metadata blocks; returns blocks and the byte offset where audio frames begin. */
export function parseFlacBlocks(fileData: Buffer): { blocks: FlacBlock[]; audioOffset: number } {
  if (fileData.length < 4 || fileData.toString('ascii', 0, 4) !== FLAC_MAGIC) {
    throw new Error('Not a valid FLAC file (missing fLaC magic)');
  }
  const blocks: FlacBlock[] = [];
  let offset = 4;
  while (offset + 4 <= fileData.length) {
    const headerByte = fileData[offset];
    const isLast = (headerByte & 0x80) !== 0;
    const type = headerByte & 0x7f;
    const length =
      (fileData[offset + 1] << 16) | (fileData[offset + 2] << 8) | fileData[offset + 3];
    offset += 4;
    if (offset + length > fileData.length) throw new Error('Truncated FLAC metadata block');
    blocks.push({ type, data: Buffer.from(fileData.subarray(offset, offset + length)) });
    offset += length;
    if (isLast) break;
  }
  return { blocks, audioOffset: offset };
}

/** Parses a Vorbis Comment block into a key→values map (keys uppercased). */
export function parseVorbisCommentBlock(data: Buffer): Map<string, string[]> {
  const result = new Map<string, string[]>();
  let offset = 0;
  if (offset + 4 > data.length) return result;
  const vendorLen = data.readUInt32LE(offset);
  offset += 4 + vendorLen;
  if (offset + 4 > data.length) return result;
  const count = data.readUInt32LE(offset);
  offset += 4;
  for (let i = 0; i < count; i++) {
    if (offset + 4 > data.length) break;
    const len = data.readUInt32LE(offset);
    offset += 4;
    if (offset + len > data.length) break;
    const comment = data.subarray(offset, offset + len).toString('utf8');
    offset += len;
    const eqIdx = comment.indexOf('=');
    if (eqIdx < 0) continue;
    const key = comment.slice(0, eqIdx).toUpperCase();
    const value = comment.slice(eqIdx + 1);
    const existing = result.get(key) ?? [];
    existing.push(value);
    result.set(key, existing);
  }
  return result;
}

/** Serialises a key→values map into a Vorbis Comment block buffer. */
function buildVorbisCommentBlock(comments: Map<string, string[]>): Buffer {
  const vendor = Buffer.from(VORBIS_VENDOR, 'utf8');
  const vendorLen = Buffer.alloc(4);
  vendorLen.writeUInt32LE(vendor.length, 0);
  const entries: Buffer[] = [];
  let totalCount = 0;
  for (const [key, values] of comments) {
    for (const val of values) {
      const entry = Buffer.from(`${key}=${val}`, 'utf8');
      const lenBuf = Buffer.alloc(4);
      lenBuf.writeUInt32LE(entry.length, 0);
      entries.push(lenBuf, entry);
      totalCount++;
    }
  }
  const countBuf = Buffer.alloc(4);
  countBuf.writeUInt32LE(totalCount, 0);
  return Buffer.concat([vendorLen, vendor, countBuf, ...entries]);
}

/** Replaces every value of the keys being written. */
function applyVorbisComments(comments: Map<string, string[]>, input: WriteTagsInput): void {
  const setTag = (key: string, value: string | undefined): void => {
    if (value !== undefined) comments.set(key, [value]);
  };
  setTag('TITLE', input.title);
  setTag('ARTIST', input.artist);
  setTag('DATE', input.year !== undefined ? String(input.year) : undefined);
  setTag('GENRE', input.genre);
  setTag('LABEL', input.label);
}

/** Serialises a list of FLAC metadata blocks + audio data back into a complete file buffer. */
function serializeFlacBlocks(blocks: FlacBlock[], audioData: Buffer): Buffer {
  const parts: Buffer[] = [Buffer.from(FLAC_MAGIC, 'ascii')];
  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i];
    const isLast = i === blocks.length - 1;
    const header = Buffer.alloc(4);
    header[0] = (isLast ? 0x80 : 0x00) | (block.type & 0x7f);
    header[1] = (block.data.length >> 16) & 0xff;
    header[2] = (block.data.length >> 8) & 0xff;
    header[3] = block.data.length & 0xff;
    parts.push(header, block.data);
  }
  parts.push(audioData);
  return Buffer.concat(parts);
}

/**
 * Writes Vorbis Comment tags to a FLAC file.
 *
 * Existing comment keys not present in `input` are preserved; keys in `input`
 * replace all existing values for that key. Old padding is dropped and the
 * rewritten comment block goes last.
 */
export function writeFlacTags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  return rewriteFile(filePath, ['flac'], 'writeFlacTags', (fileData) => {
    const { blocks, audioOffset } = parseFlacBlocks(fileData);
    const audioData = fileData.subarray(audioOffset);

    const vcBlock = blocks.find((b) => b.type === FLAC_BLOCK_TYPE_VORBIS_COMMENT);
    const comments = vcBlock ? parseVorbisCommentBlock(vcBlock.data) : new Map<string, string[]>();
    applyVorbisComments(comments, input);

    const newBlocks = blocks.filter(
      (b) => b.type !== FLAC_BLOCK_TYPE_VORBIS_COMMENT && b.type !== FLAC_BLOCK_TYPE_PADDING,
    );
    newBlocks.push({ type: FLAC_BLOCK_TYPE_VORBIS_COMMENT, data: buildVorbisCommentBlock(comments) });

    return serializeFlacBlocks(newBlocks, audioData);
  });
}

// ─── OGG Vorbis Tag Writing ───────────────────────────────────────────────────

const OGG_CAPTURE_PATTERN = 'OggS';
const OGG_PAGE_HEADER_SIZE = 27;
const OGG_MAX_SEGMENTS = 255;
const OGG_FLAG_CONTINUED = 0x01;
const OGG_FLAG_EOS = 0x04;
const VORBIS_IDENTIFICATION_HEADER = Buffer.from('\x01vorbis', 'latin1');
const VORBIS_COMMENT_HEADER = Buffer.from('\x03vorbis', 'latin1');
const VORBIS_SETUP_HEADER = Buffer.from('\x05vorbis', 'latin1');

/** One Ogg page; `start`/`end` locate it in the buffer it was parsed from */
export interface OggPage {
  headerType: number;
  /** Raw 8-byte granule position */
  granule: Buffer;
  serial: number;
  sequence: number;
  lacing: number[];
  body: Buffer;
  start: number;
  end: number;
}

/** CRC lookup for polynomial 0x04C11DB7, MSB first */
const OGG_CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let r = i << 24;
    for (let bit = 0; bit < 8; bit++) {
      r = (r & 0x80000000) !== 0 ? (r << 1) ^ 0x04c11db7 : r << 1;
    }
    table[i] = r >>> 0;
  }
  return table;
})();

/**
 * Ogg page checksum: CRC-32 with polynomial 0x04C11DB7, zero initial value,
 * no reflection and no final XOR. Pages are checksummed with the CRC field zeroed.
 */
export function oggCrc32(data: Buffer): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) ^ OGG_CRC_TABLE[((crc >>> 24) ^ byte) & 0xff]) >>> 0;
  }
  return crc;
}

/** Parses every page of an Ogg file. */
export function parseOggPages(fileData: Buffer): OggPage[] {
  const pages: OggPage[] = [];
  let offset = 0;
  while (offset < fileData.length) {
    if (
      offset + OGG_PAGE_HEADER_SIZE > fileData.length ||
      fileData.toString('latin1', offset, offset + 4) !== OGG_CAPTURE_PATTERN
    ) {
      throw new Error(`Not a valid Ogg file (missing OggS capture pattern at offset ${offset})`);
    }
    const lacingStart = offset + OGG_PAGE_HEADER_SIZE;
    const bodyStart = lacingStart + fileData[offset + 26];
    if (bodyStart > fileData.length) throw new Error('Truncated Ogg page header');

    const lacing = [...fileData.subarray(lacingStart, bodyStart)];
    const bodyEnd = bodyStart + lacing.reduce((sum, value) => sum + value, 0);
    if (bodyEnd > fileData.length) throw new Error('Truncated Ogg page');

    pages.push({
      headerType: fileData[offset + 5],
      granule: Buffer.from(fileData.subarray(offset + 6, offset + 14)),
      serial: fileData.readUInt32LE(offset + 14),
      sequence: fileData.readUInt32LE(offset + 18),
      lacing,
      body: Buffer.from(fileData.subarray(bodyStart, bodyEnd)),
      start: offset,
      end: bodyEnd,
    });
    offset = bodyEnd;
  }
  return pages;
}

/** Serialises a page and fills in its checksum. */
export function buildOggPage(page: Omit<OggPage, 'start' | 'end'>): Buffer {
  const header = Buffer.alloc(OGG_PAGE_HEADER_SIZE + page.lacing.length);
  header.write(OGG_CAPTURE_PATTERN, 0, 4, 'latin1');
  header[5] = page.headerType;
  page.granule.copy(header, 6);
  header.writeUInt32LE(page.serial, 14);
  header.writeUInt32LE(page.sequence >>> 0, 18);
  header[26] = page.lacing.length;
  page.lacing.forEach((value, i) => {
    header[OGG_PAGE_HEADER_SIZE + i] = value;
  });

  const bytes = Buffer.concat([header, page.body]);
  bytes.writeUInt32LE(oggCrc32(bytes), 22);
  return bytes;
}

/**
 * Lays packets out on fresh pages (granule 0). Every packet ends in a lacing
 * value below 255, so one that is an exact multiple of 255 gets a trailing 0.
 */
function paginatePackets(
  packets: Buffer[],
  serial: number,
  firstSequence: number,
): Array<Omit<OggPage, 'start' | 'end'>> {
  const segments: Buffer[] = [];
  for (const packet of packets) {
    let offset = 0;
    while (packet.length - offset >= 255) {
      segments.push(packet.subarray(offset, offset + 255));
      offset += 255;
    }
    segments.push(packet.subarray(offset));
  }

  const pages: Array<Omit<OggPage, 'start' | 'end'>> = [];
  let continued = false;
  for (let i = 0; i < segments.length; i += OGG_MAX_SEGMENTS) {
    const pageSegments = segments.slice(i, i + OGG_MAX_SEGMENTS);
    pages.push({
      headerType: continued ? OGG_FLAG_CONTINUED : 0,
      granule: Buffer.alloc(8),
      serial,
      sequence: firstSequence + pages.length,
      lacing: pageSegments.map((segment) => segment.length),
      body: Buffer.concat(pageSegments),
    });
    continued = pageSegments[pageSegments.length - 1].length === 255;
  }
  return pages;
}

/**
 * Reassembles the three Vorbis header packets of the first logical stream.
 *
 * @returns The packets and the index of the page the setup header ends on
 * @throws If the identification header shares its page, or audio shares the setup header's page
 */
export function readVorbisHeaderPackets(pages: OggPage[]): { packets: Buffer[]; lastHeaderPage: number } {
  if (pages.length === 0) throw new Error('Not a valid Ogg file (no pages)');
  const serial = pages[0].serial;
  const packets: Buffer[] = [];
  let pending: Buffer[] = [];

  for (let index = 0; index < pages.length; index++) {
    const page = pages[index];
    if (page.serial !== serial) continue;

    let offset = 0;
    for (let segment = 0; segment < page.lacing.length; segment++) {
      const length = page.lacing[segment];
      pending.push(page.body.subarray(offset, offset + length));
      offset += length;
      if (length === 255) continue;

      packets.push(Buffer.concat(pending));
      pending = [];
      const endsPage = segment === page.lacing.length - 1;
      if (packets.length === 1 && (index !== 0 || !endsPage)) {
        throw new Error('Unsupported Ogg layout: identification header must fill the first page');
      }
      if (packets.length === 3) {
        if (!endsPage) throw new Error('Unsupported Ogg layout: audio data shares a page with the setup header');
        return { packets, lastHeaderPage: index };
      }
    }
  }
  throw new Error('Incomplete Vorbis headers');
}

function startsWith(packet: Buffer, prefix: Buffer): boolean {
  return packet.length >= prefix.length && packet.subarray(0, prefix.length).equals(prefix);
}

/**
 * Writes Vorbis comments to an Ogg Vorbis file.
 *
 * The comment and setup headers are re-paged, later pages of the stream are
 * renumbered and their checksums recomputed. Pages of other logical streams
 * are copied as they are.
 */
export function writeOggTags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  return rewriteFile(filePath, ['ogg'], 'writeOggTags', (fileData) => {
    const pages = parseOggPages(fileData);
    const { packets, lastHeaderPage } = readVorbisHeaderPackets(pages);
    const [identification, commentHeader, setupHeader] = packets;
    if (
      !startsWith(identification, VORBIS_IDENTIFICATION_HEADER) ||
      !startsWith(commentHeader, VORBIS_COMMENT_HEADER) ||
      !startsWith(setupHeader, VORBIS_SETUP_HEADER)
    ) {
      throw new Error('Not an Ogg Vorbis stream');
    }

    const comments = parseVorbisCommentBlock(commentHeader.subarray(VORBIS_COMMENT_HEADER.length));
    applyVorbisComments(comments, input);
    const newCommentHeader = Buffer.concat([
      VORBIS_COMMENT_HEADER,
      buildVorbisCommentBlock(comments),
      Buffer.from([1]), // framing bit
    ]);

    const first = pages[0];
    const oldHeaderPages = pages.slice(1, lastHeaderPage + 1).filter((page) => page.serial === first.serial);
    const headerPages = paginatePackets([newCommentHeader, setupHeader], first.serial, first.sequence + 1);
    if (oldHeaderPages.some((page) => (page.headerType & OGG_FLAG_EOS) !== 0)) {
      headerPages[headerPages.length - 1].headerType |= OGG_FLAG_EOS;
    }
    const shift = headerPages.length - oldHeaderPages.length;

    const parts: Buffer[] = [fileData.subarray(first.start, first.end)];
    let headersWritten = false;
    for (const page of pages.slice(1)) {
      if (page.serial !== first.serial) {
        parts.push(fileData.subarray(page.start, page.end));
      } else if (oldHeaderPages.includes(page)) {
        if (!headersWritten) parts.push(...headerPages.map(buildOggPage));
        headersWritten = true;
      } else if (shift === 0) {
        parts.push(fileData.subarray(page.start, page.end));
      } else {
        parts.push(buildOggPage({ ...page, sequence: page.sequence + shift }));
      }
    }
    return Buffer.concat(parts);
  });
}

// ─── MP4 Tag Writing ──────────────────────────────────────────────────────────

/** Location of one atom (box) inside a buffer */
export interface Mp4Atom {
  type: string;
  start: number;
  end: number;
  headerSize: number;
}

/** iTunes-style text atoms for each input field ('©' is 0xA9 in latin1) */
const MP4_TEXT_ATOMS = {
  title: '©nam',
  artist: '©ART',
  year: '©day',
  genre: '©gen',
} as const;

/** Freeform atom namespace used for the label */
const ITUNES_FREEFORM_MEAN = 'com.apple.iTunes';
const LABEL_FREEFORM_NAME = 'LABEL';

/** Atoms on the path from moov to the chunk offset tables */
const CHUNK_OFFSET_CONTAINERS = new Set(['trak', 'mdia', 'minf', 'stbl']);

/**
 * Parses consecutive atoms between `start` and `end`. Handles 64-bit sizes
 * (size == 1) and atoms that run to the end of their parent (size == 0).
 */
export function parseAtoms(data: Buffer, start: number, end: number): Mp4Atom[] {
  const atoms: Mp4Atom[] = [];
  let offset = start;
  while (offset + 8 <= end) {
    let size = data.readUInt32BE(offset);
    const type = data.toString('latin1', offset + 4, offset + 8);
    let headerSize = 8;

    if (size === 1) {
      if (offset + 16 > end) throw new Error(`Truncated MP4 atom header: '${type}'`);
      size = Number(data.readBigUInt64BE(offset + 8));
      headerSize = 16;
    } else if (size === 0) {
      size = end - offset;
    }

    if (size < headerSize || offset + size > end) {
      throw new Error(`Invalid MP4 atom size for '${type}' at offset ${offset}`);
    }

    atoms.push({ type, start: offset, end: offset + size, headerSize });
    offset += size;
  }
  return atoms;
}

/** Builds an atom with a 32-bit header around the given payload. */
function buildAtom(type: string, ...payload: Buffer[]): Buffer {
  const body = Buffer.concat(payload);
  const header = Buffer.alloc(8);
  header.writeUInt32BE(body.length + 8, 0);
  header.write(type, 4, 4, 'latin1');
  return Buffer.concat([header, body]);
}

/** Builds a UTF-8 'data' atom (type indicator 1, locale 0). */
function buildDataAtom(value: string): Buffer {
  const prefix = Buffer.alloc(8);
  prefix.writeUInt32BE(1, 0);
  return buildAtom('data', prefix, Buffer.from(value, 'utf8'));
}

/** Builds a '----' freeform item with mean/name/data children. */
function buildFreeformAtom(mean: string, name: string, value: string): Buffer {
  return buildAtom(
    '----',
    buildAtom('mean', Buffer.alloc(4), Buffer.from(mean, 'utf8')),
    buildAtom('name', Buffer.alloc(4), Buffer.from(name, 'utf8')),
    buildDataAtom(value),
  );
}

/** Builds the 'hdlr' atom an iTunes metadata 'meta' atom requires. */
function buildMetadataHandler(): Buffer {
  const body = Buffer.alloc(25);
  body.write('mdir', 8, 4, 'latin1');
  body.write('appl', 12, 4, 'latin1');
  return buildAtom('hdlr', body);
}

/** Returns the name of a '----' freeform item, or null if it has none. */
function freeformName(data: Buffer, item: Mp4Atom): string | null {
  const name = parseAtoms(data, item.start + item.headerSize, item.end).find((a) => a.type === 'name');
  if (!name) return null;
  return data.toString('utf8', name.start + name.headerSize + 4, name.end);
}

/**
 * Rebuilds the 'ilst' atom: items being written replace existing ones,
 * everything else is copied through unchanged.
 */
function buildIlst(data: Buffer, ilst: Mp4Atom | undefined, input: WriteTagsInput): Buffer {
  const replacements = new Map<string, string>();
  if (input.title !== undefined) replacements.set(MP4_TEXT_ATOMS.title, input.title);
  if (input.artist !== undefined) replacements.set(MP4_TEXT_ATOMS.artist, input.artist);
  if (input.year !== undefined) replacements.set(MP4_TEXT_ATOMS.year, String(input.year));
  if (input.genre !== undefined) replacements.set(MP4_TEXT_ATOMS.genre, input.genre);

  const items: Buffer[] = [];
  if (ilst) {
    for (const item of parseAtoms(data, ilst.start + ilst.headerSize, ilst.end)) {
      if (replacements.has(item.type)) continue;
      // Numeric ID3v1 genre would shadow the text genre
      if (item.type === 'gnre' && input.genre !== undefined) continue;
      if (
        item.type === '----' &&
        input.label !== undefined &&
        freeformName(data, item)?.toUpperCase() === LABEL_FREEFORM_NAME
      ) {
        continue;
      }
      items.push(data.subarray(item.start, item.end));
    }
  }

  for (const [type, value] of replacements) {
    items.push(buildAtom(type, buildDataAtom(value)));
  }
  if (input.label !== undefined) {
    items.push(buildFreeformAtom(ITUNES_FREEFORM_MEAN, LABEL_FREEFORM_NAME, input.label));
  }

  return buildAtom('ilst', ...items);
}

/**
 * Rebuilds a container atom with one child replaced (or appended when the
 * container has no child of that type). `prefixLength` bytes after the header
 * (the version/flags of a full box) are kept as they are.
 */
function replaceChild(
  data: Buffer,
  parent: Mp4Atom,
  prefixLength: number,
  childType: string,
  newChild: Buffer,
): Buffer {
  const childrenStart = parent.start + parent.headerSize + prefixLength;
  const parts: Buffer[] = [data.subarray(parent.start + parent.headerSize, childrenStart)];
  let replaced = false;

  for (const child of parseAtoms(data, childrenStart, parent.end)) {
    if (child.type === childType) {
      if (!replaced) parts.push(newChild);
      replaced = true;
      continue;
    }
    parts.push(data.subarray(child.start, child.end));
  }
  if (!replaced) parts.push(newChild);

  return buildAtom(parent.type, ...parts);
}

/**
 * Shifts every chunk offset (stco/co64) at or beyond `threshold` by `delta`.
 * Needed when a resized moov atom sits before the media data it points into.
 * Mutates `moov` in place.
 */
function shiftChunkOffsets(moov: Buffer, threshold: number, delta: number): void {
  const visit = (start: number, end: number): void => {
    for (const atom of parseAtoms(moov, start, end)) {
      const body = atom.start + atom.headerSize;

      if (CHUNK_OFFSET_CONTAINERS.has(atom.type)) {
        visit(body, atom.end);
      } else if (atom.type === 'stco' || atom.type === 'co64') {
        const entrySize = atom.type === 'stco' ? 4 : 8;
        const count = moov.readUInt32BE(body + 4);
        if (body + 8 + count * entrySize > atom.end) {
          throw new Error(`Truncated '${atom.type}' table`);
        }

        for (let i = 0; i < count; i++) {
          const pos = body + 8 + i * entrySize;
          if (entrySize === 4) {
            const offset = moov.readUInt32BE(pos);
            if (offset >= threshold) moov.writeUInt32BE(offset + delta, pos);
          } else {
            const offset = moov.readBigUInt64BE(pos);
            if (offset >= BigInt(threshold)) moov.writeBigUInt64BE(offset + BigInt(delta), pos);
          }
        }
      }
    }
  };

  const [root] = parseAtoms(moov, 0, moov.length);
  visit(root.start + root.headerSize, root.end);
}

/**
 * Writes iTunes-style metadata (moov/udta/meta/ilst) to an M4A/MP4 file.
 *
 * Missing udta/meta/ilst atoms are created. When the moov atom changes size,
 * chunk offsets pointing past it are adjusted so audio stays addressable.
 */
export function writeMp4Tags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  return rewriteFile(filePath, ['m4a', 'mp4'], 'writeMp4Tags', (fileData) => {
    const moov = parseAtoms(fileData, 0, fileData.length).find((a) => a.type === 'moov');
    if (!moov) throw new Error('No moov atom found');

    const udta = parseAtoms(fileData, moov.start + moov.headerSize, moov.end).find(
      (a) => a.type === 'udta',
    );
    const meta = udta
      ? parseAtoms(fileData, udta.start + udta.headerSize, udta.end).find((a) => a.type === 'meta')
      : undefined;
    const ilst = meta
      ? parseAtoms(fileData, meta.start + meta.headerSize + 4, meta.end).find(
          (a) => a.type === 'ilst',
        )
      : undefined;

    const newIlst = buildIlst(fileData, ilst, input);
    const newMeta = meta
      ? replaceChild(fileData, meta, 4, 'ilst', newIlst)
      : buildAtom('meta', Buffer.alloc(4), buildMetadataHandler(), newIlst);
    const newUdta = udta ? replaceChild(fileData, udta, 0, 'meta', newMeta) : buildAtom('udta', newMeta);
    const newMoov = replaceChild(fileData, moov, 0, 'udta', newUdta);

    const delta = newMoov.length - (moov.end - moov.start);
    if (delta !== 0) {
      shiftChunkOffsets(newMoov, moov.end, delta);
    }

    return Buffer.concat([fileData.subarray(0, moov.start), newMoov, fileData.subarray(moov.end)]);
  });
}

// ─── ASF (WMA) Tag Writing ────────────────────────────────────────────────────

/**
 * Converts a GUID string to its ASF byte layout: the first three groups are
 * little-endian, the last two are stored as written.
 */
export function asfGuid(text: string): Buffer {
  const bytes = Buffer.from(text.replace(/-/g, ''), 'hex');
  return Buffer.concat([
    Buffer.from(bytes.subarray(0, 4)).reverse(),
    Buffer.from(bytes.subarray(4, 6)).reverse(),
    Buffer.from(bytes.subarray(6, 8)).reverse(),
    bytes.subarray(8),
  ]);
}

export const ASF_HEADER_GUID = asfGuid('75B22630-668E-11CF-A6D9-00AA0062CE6C');
export const ASF_FILE_PROPERTIES_GUID = asfGuid('8CABDCA1-A947-11CF-8EE4-00C00C205365');
export const ASF_CONTENT_DESCRIPTION_GUID = asfGuid('75B22633-668E-11CF-A6D9-00AA0062CE6C');
export const ASF_EXTENDED_CONTENT_DESCRIPTION_GUID = asfGuid('D2D0A440-E307-11D2-97F0-00A0C95EA850');

const ASF_OBJECT_HEADER_SIZE = 24;
/** Header object: GUID, size, object count and two reserved bytes */
const ASF_HEADER_OBJECT_SIZE = 30;
/** Offset of the file size inside the File Properties payload (after the file id) */
const ASF_FILE_SIZE_OFFSET = 16;
const ASF_UNICODE_STRING = 0;

/** Extended content descriptors for the release fields */
const ASF_EXTENDED_NAMES = {
  year: 'WM/Year',
  genre: 'WM/Genre',
  label: 'WM/Publisher',
} as const;

/** A top-level object of the ASF header; `data` excludes the 24-byte object header */
export interface AsfObject {
  guid: Buffer;
  data: Buffer;
}

export interface AsfContentDescription {
  title: string;
  author: string;
  copyright: string;
  description: string;
  rating: string;
}

export interface AsfDescriptor {
  name: string;
  type: number;
  value: Buffer;
}

/** Content Description strings in their stored order */
const CONTENT_DESCRIPTION_FIELDS = ['title', 'author', 'copyright', 'description', 'rating'] as const;

/** Parses the ASF Header Object; `headerEnd` is where the Data Object starts. */
export function parseAsfHeader(fileData: Buffer): { objects: AsfObject[]; reserved: Buffer; headerEnd: number } {
  if (fileData.length < ASF_HEADER_OBJECT_SIZE || !fileData.subarray(0, 16).equals(ASF_HEADER_GUID)) {
    throw new Error('Not a valid ASF file (missing header object)');
  }
  const headerEnd = Number(fileData.readBigUInt64LE(16));
  if (headerEnd < ASF_HEADER_OBJECT_SIZE || headerEnd > fileData.length) {
    throw new Error('Invalid ASF header size');
  }

  const count = fileData.readUInt32LE(24);
  const objects: AsfObject[] = [];
  let offset = ASF_HEADER_OBJECT_SIZE;
  for (let i = 0; i < count; i++) {
    if (offset + ASF_OBJECT_HEADER_SIZE > headerEnd) throw new Error('Truncated ASF header object');
    const size = Number(fileData.readBigUInt64LE(offset + 16));
    if (size < ASF_OBJECT_HEADER_SIZE || offset + size > headerEnd) {
      throw new Error(`Invalid ASF object size at offset ${offset}`);
    }
    objects.push({
      guid: Buffer.from(fileData.subarray(offset, offset + 16)),
      data: Buffer.from(fileData.subarray(offset + ASF_OBJECT_HEADER_SIZE, offset + size)),
    });
    offset += size;
  }

  return { objects, reserved: Buffer.from(fileData.subarray(28, 30)), headerEnd };
}

function buildAsfObject(guid: Buffer, data: Buffer): Buffer {
  const size = Buffer.alloc(8);
  size.writeBigUInt64LE(BigInt(ASF_OBJECT_HEADER_SIZE + data.length));
  return Buffer.concat([guid, size, data]);
}

/** UTF-16LE with a terminating null; an empty string has no bytes at all. */
function encodeAsfString(value: string): Buffer {
  const encoded = value === '' ? Buffer.alloc(0) : Buffer.from(`${value}\0`, 'utf16le');
  if (encoded.length > 0xffff) throw new Error('ASF string too long');
  return encoded;
}

function decodeAsfString(data: Buffer): string {
  return data.toString('utf16le').replace(/\0+$/, '');
}

export function parseContentDescription(data: Buffer): AsfContentDescription {
  if (data.length < 10) throw new Error('Truncated ASF content description');
  const description: AsfContentDescription = { title: '', author: '', copyright: '', description: '', rating: '' };
  let offset = 10;
  CONTENT_DESCRIPTION_FIELDS.forEach((field, i) => {
    const length = data.readUInt16LE(i * 2);
    if (offset + length > data.length) throw new Error('Truncated ASF content description');
    description[field] = decodeAsfString(data.subarray(offset, offset + length));
    offset += length;
  });
  return description;
}

function buildContentDescription(description: AsfContentDescription): Buffer {
  const strings = CONTENT_DESCRIPTION_FIELDS.map((field) => encodeAsfString(description[field]));
  const lengths = Buffer.alloc(10);
  strings.forEach((value, i) => lengths.writeUInt16LE(value.length, i * 2));
  return Buffer.concat([lengths, ...strings]);
}

export function parseExtendedContentDescription(data: Buffer): AsfDescriptor[] {
  if (data.length < 2) throw new Error('Truncated ASF extended content description');
  const count = data.readUInt16LE(0);
  const descriptors: AsfDescriptor[] = [];
  let offset = 2;
  for (let i = 0; i < count; i++) {
    if (offset + 2 > data.length) throw new Error('Truncated ASF extended content description');
    const nameLength = data.readUInt16LE(offset);
    const valueHeader = offset + 2 + nameLength;
    if (valueHeader + 4 > data.length) throw new Error('Truncated ASF extended content description');
    const valueLength = data.readUInt16LE(valueHeader + 2);
    const valueStart = valueHeader + 4;
    if (valueStart + valueLength > data.length) throw new Error('Truncated ASF extended content description');

    descriptors.push({
      name: decodeAsfString(data.subarray(offset + 2, valueHeader)),
      type: data.readUInt16LE(valueHeader),
      value: Buffer.from(data.subarray(valueStart, valueStart + valueLength)),
    });
    offset = valueStart + valueLength;
  }
  return descriptors;
}

function buildExtendedContentDescription(descriptors: AsfDescriptor[]): Buffer {
  const count = Buffer.alloc(2);
  count.writeUInt16LE(descriptors.length);
  const parts: Buffer[] = [count];
  for (const descriptor of descriptors) {
    const name = encodeAsfString(descriptor.name);
    const header = Buffer.alloc(2);
    header.writeUInt16LE(name.length);
    const valueHeader = Buffer.alloc(4);
    valueHeader.writeUInt16LE(descriptor.type, 0);
    valueHeader.writeUInt16LE(descriptor.value.length, 2);
    parts.push(header, name, valueHeader, descriptor.value);
  }
  return Buffer.concat(parts);
}

/**
 * Writes tags to a WMA (ASF) file.
 *
 * Title and artist go to the Content Description object (title/author).
 * Year, genre and label go to the Extended Content Description as
 * WM/Year, WM/Genre and WM/Publisher. Other fields and objects are kept.
 * The File Properties file size follows the new header length.
 */
export function writeWmaTags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  return rewriteFile(filePath, ['wma'], 'writeWmaTags', (fileData) => {
    const { objects, reserved, headerEnd } = parseAsfHeader(fileData);
    const isObject = (guid: Buffer) => (object: AsfObject) => object.guid.equals(guid);

    const contentObject = objects.find(isObject(ASF_CONTENT_DESCRIPTION_GUID));
    const description = contentObject
      ? parseContentDescription(contentObject.data)
      : { title: '', author: '', copyright: '', description: '', rating: '' };
    if (input.title !== undefined) description.title = input.title;
    if (input.artist !== undefined) description.author = input.artist;

    const extendedObject = objects.find(isObject(ASF_EXTENDED_CONTENT_DESCRIPTION_GUID));
    let descriptors = extendedObject ? parseExtendedContentDescription(extendedObject.data) : [];
    const extended: Array<[string, string | undefined]> = [
      [ASF_EXTENDED_NAMES.year, input.year !== undefined ? String(input.year) : undefined],
      [ASF_EXTENDED_NAMES.genre, input.genre],
      [ASF_EXTENDED_NAMES.label, input.label],
    ];
    for (const [name, value] of extended) {
      if (value === undefined) continue;
      descriptors = descriptors.filter((d) => d.name.toLowerCase() !== name.toLowerCase());
      descriptors.push({ name, type: ASF_UNICODE_STRING, value: encodeAsfString(value) });
    }

    const updated: AsfObject[] = objects.filter(
      (object) =>
        !object.guid.equals(ASF_CONTENT_DESCRIPTION_GUID) &&
        !object.guid.equals(ASF_EXTENDED_CONTENT_DESCRIPTION_GUID),
    );
    updated.push({ guid: ASF_CONTENT_DESCRIPTION_GUID, data: buildContentDescription(description) });
    if (descriptors.length > 0) {
      updated.push({
        guid: ASF_EXTENDED_CONTENT_DESCRIPTION_GUID,
        data: buildExtendedContentDescription(descriptors),
      });
    }

    const body = updated.reduce((sum, object) => sum + ASF_OBJECT_HEADER_SIZE + object.data.length, 0);
    const newHeaderEnd = ASF_HEADER_OBJECT_SIZE + body;
    const fileProperties = updated.find(isObject(ASF_FILE_PROPERTIES_GUID));
    if (fileProperties && fileProperties.data.length >= ASF_FILE_SIZE_OFFSET + 8) {
      fileProperties.data.writeBigUInt64LE(
        BigInt(fileData.length - headerEnd + newHeaderEnd),
        ASF_FILE_SIZE_OFFSET,
      );
    }

    const header = Buffer.alloc(ASF_HEADER_OBJECT_SIZE);
    ASF_HEADER_GUID.copy(header, 0);
    header.writeBigUInt64LE(BigInt(newHeaderEnd), 16);
    header.writeUInt32LE(updated.length, 24);
    reserved.copy(header, 28);

    return Buffer.concat([
      header,
      ...updated.map((object) => buildAsfObject(object.guid, object.data)),
      fileData.subarray(headerEnd),
    ]);
  });
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

/**
 * Writes tags to an audio file, dispatching to the appropriate writer based on format.
 *
 * Supports MP3, WAV, FLAC, OGG Vorbis, M4A/MP4 and WMA.
 *
 * @param filePath - Absolute path to the audio file
 * @param input - Metadata fields to write
 * @returns WriteTagsResult indicating success or failure
 */
export function writeTags(filePath: string, input: WriteTagsInput): WriteTagsResult {
  const format = getFormatFromPath(filePath);

  if (format === null) {
    return {
      success: false,
      filePath,
      error: `Unsupported audio format: ${path.extname(filePath)}`,
    };
  }

  switch (format) {
    case 'mp3':
      return writeMp3Tags(filePath, input);
    case 'wav':
      return writeWavTags(filePath, input);
    case 'flac':
      return writeFlacTags(filePath, input);
    case 'm4a':
    case 'mp4':
      return writeMp4Tags(filePath, input);
    case 'ogg':
      return writeOggTags(filePath, input);
    case 'wma':
      return writeWmaTags(filePath, input);
    default: {
      const _exhaustive: never = format;
      return {
        success: false,
        filePath,
        error: `Unknown format: ${String(_exhaustive)}`,
      };
    }
  }
}
