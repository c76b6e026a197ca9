import { readFile } from "node:fs/promises";
import type { IPointSource, Vec2 } from "@linework/contracts";
import { PointDataError } from "../errors";

export interface CsvPointSourceConfig {
  /** Field separator */
  delimiter?: string;
  /** Skip the first non-blank line */
  header?: boolean;
}

const DEFAULT_CONFIG: Required<CsvPointSourceConfig> = {
  delimiter: ",",
  header: false,
};

function parseField(raw: string | undefined, line: number, what: string): number {
  const text = raw?.trim() ?? "";
  const value = Number(text);
  if (text === "" || !Number.isFinite(value)) {
    throw new PointDataError(`Line ${line}: ${what} "${text}" is not a number`, line);
  }
  return value;
}

/**
 * Parses `x,y` rows into points, in file order. Blank lines are skipped;
 * columns after the second are ignored.
 */
export function parsePointCsv(text: string, config: CsvPointSourceConfig = {}): Vec2[] {
  const { delimiter, header } = { ...DEFAULT_CONFIG, ...config };
  const points: Vec2[] = [];
  let headerPending = header;

  text.split(/\r?\n/).forEach((row, index) => {
    const line = index + 1;
    if (row.trim() === "") return;
    if (headerPending) {
      headerPending = false;
      return;
    }
    const fields = row.split(delimiter);
    if (fields.length < 2) {
      throw new PointDataError(`Line ${line}: expected x${delimiter}y, got "${row.trim()}"`, line);
    }
    points.push([parseField(fields[0], line, "x"), parseField(fields[1], line, "y")]);
  });

  return points;
}

/**
 * Point source backed by a CSV file of `x,y` rows.
 */
export class CsvPointSource implements IPointSource {
  private config: Required<CsvPointSourceConfig>;

  constructor(
    readonly path: string,
    config: CsvPointSourceConfig = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async load(): Promise<Vec2[]> {
    const text = await readFile(this.path, "utf8");
    return parsePointCsv(text, this.config);
  }
}
