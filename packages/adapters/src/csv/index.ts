export { CsvPointSource, parsePointCsv, type CsvPointSourceConfig } from "./CsvPointSource";
