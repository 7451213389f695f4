import { CatalogFormatError } from "@shellmsg/application";

const MO_MAGIC = 0x950412de;
const MO_HEADER_SIZE = 28;
const MO_TABLE_ENTRY_SIZE = 8;

const CONTEXT_SEPARATOR = "\u0004";
const PLURAL_SEPARATOR = "\u0000";

export interface MoCatalog {
  header: Record<string, string>;
  charset: string;
  messages: Map<string, string>;
}

type ReadUInt32 = (offset: number) => number;

function selectReader(buffer: Buffer, source: string): ReadUInt32 {
  if (buffer.readUInt32LE(0) === MO_MAGIC) {
    return (offset) => buffer.readUInt32LE(offset);
  }
  if (buffer.readUInt32BE(0) === MO_MAGIC) {
    return (offset) => buffer.readUInt32BE(offset);
  }
  throw new CatalogFormatError(`${source}: not a gettext catalog`, { source });
}

export function parseMoHeader(text: string): Record<string, string> {
  const header: Record<string, string> = {};

  for (const line of text.split("\n")) {
    const separator = line.indexOf(":");
    if (separator <= 0) continue;
    header[line.slice(0, separator).trim().toLowerCase()] = line
      .slice(separator + 1)
      .trim();
  }

  return header;
}

export function charsetFromHeader(header: Record<string, string>): string {
  const contentType = header["content-type"] ?? "";
  const match = /charset=([^;\s]+)/i.exec(contentType);
  const charset = match?.[1]?.toLowerCase();
  // "CHARSET" is the placeholder xgettext leaves in untouched templates.
  return charset && charset !== "charset" ? charset : "utf-8";
}

// WHATWG maps these labels to windows-1252; gettext means ISO-8859-1.
const LATIN1_CHARSETS = new Set(["iso-8859-1", "iso8859-1", "latin1"]);

type DecodeBytes = (bytes: Buffer) => string;

function createDecoder(charset: string, source: string): DecodeBytes {
  if (LATIN1_CHARSETS.has(charset)) {
    return (bytes) => bytes.toString("latin1");
  }

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new CatalogFormatError(
        `${source}: unsupported charset ${charset}`,
        { source, charset },
      );
    }
    throw error;
  }

  return (bytes) => {
    try {
      return decoder.decode(bytes);
    } catch (error) {
      if (error instanceof TypeError) {
        throw new CatalogFormatError(
          `${source}: string is not valid ${charset}`,
          { source, charset },
        );
      }
      throw error;
    }
  };
}

/**
 * Parses a GNU gettext binary catalog (either byte order, revision 0.x).
 *
 * Only plain msgids are kept: context-qualified entries are skipped, and a
 * plural entry is keyed by its singular msgid with its first plural form.
 */
export function parseMoFile(buffer: Buffer, source = "<buffer>"): MoCatalog {
  if (buffer.length < MO_HEADER_SIZE) {
    throw new CatalogFormatError(`${source}: truncated catalog header`, {
      source,
    });
  }

  const read = selectReader(buffer, source);
  const majorRevision = read(4) >>> 16;
  if (majorRevision !== 0) {
    throw new CatalogFormatError(
      `${source}: unsupported catalog revision ${majorRevision}`,
      { source },
    );
  }

  const count = read(8);
  const originalsOffset = read(12);
  const translationsOffset = read(16);

  function readBytes(tableOffset: number, index: number): Buffer {
    const entryOffset = tableOffset + index * MO_TABLE_ENTRY_SIZE;
    if (entryOffset + MO_TABLE_ENTRY_SIZE > buffer.length) {
      throw new CatalogFormatError(`${source}: string table out of range`, {
        source,
      });
    }

    const length = read(entryOffset);
    const offset = read(entryOffset + 4);
    if (offset + length > buffer.length) {
      throw new CatalogFormatError(`${source}: string data out of range`, {
        source,
      });
    }

    return buffer.subarray(offset, offset + length);
  }

  const raw: Array<{ msgid: Buffer; msgstr: Buffer }> = [];
  let headerText = "";

  for (let index = 0; index < count; index += 1) {
    const msgid = readBytes(originalsOffset, index);
    const msgstr = readBytes(translationsOffset, index);

    if (msgid.length === 0) {
      headerText = msgstr.toString("latin1");
      continue;
    }
    raw.push({ msgid, msgstr });
  }

  const header = parseMoHeader(headerText);
  const charset = charsetFromHeader(header);
  const decode = createDecoder(charset, source);
  const messages = new Map<string, string>();

  for (const entry of raw) {
    const msgid = decode(entry.msgid);
    if (msgid.includes(CONTEXT_SEPARATOR)) continue;

    const [singular = ""] = msgid.split(PLURAL_SEPARATOR);
    const [translation = ""] = decode(entry.msgstr).split(
      PLURAL_SEPARATOR,
    );
    if (translation.length === 0) continue;

    messages.set(singular, translation);
  }

  return { header, charset, messages };
}
