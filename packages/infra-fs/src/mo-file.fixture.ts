export interface BuildMoFileOptions {
  byteOrder?: "LE" | "BE";
  encoding?: BufferEncoding;
  revision?: number;
}

const HEADER_SIZE = 28;
const MAGIC = 0x950412de;

/** Serializes msgid/msgstr pairs into a gettext binary catalog for tests. */
export function buildMoFile(
  entries: ReadonlyArray<readonly [string, string]>,
  options: BuildMoFileOptions = {},
): Buffer {
  const encoding = options.encoding ?? "utf8";
  const count = entries.length;
  const originalsOffset = HEADER_SIZE;
  const translationsOffset = originalsOffset + count * 8;
  const head = Buffer.alloc(translationsOffset + count * 8);

  const write = (value: number, offset: number): void => {
    if (options.byteOrder === "BE") {
      head.writeUInt32BE(value, offset);
    } else {
      head.writeUInt32LE(value, offset);
    }
  };

  write(MAGIC, 0);
  write(options.revision ?? 0, 4);
  write(count, 8);
  write(originalsOffset, 12);
  write(translationsOffset, 16);
  write(0, 20);
  write(head.length, 24);

  const chunks: Buffer[] = [];
  let dataOffset = head.length;

  const appendTable = (tableOffset: number, column: 0 | 1): void => {
    entries.forEach((entry, index) => {
      const bytes = Buffer.from(entry[column], encoding);
      write(bytes.length, tableOffset + index * 8);
      write(dataOffset, tableOffset + index * 8 + 4);
      chunks.push(bytes, Buffer.from([0]));
      dataOffset += bytes.length + 1;
    });
  };

  appendTable(originalsOffset, 0);
  appendTable(translationsOffset, 1);

  return Buffer.concat([head, ...chunks]);
}
