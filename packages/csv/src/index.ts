/**
 * @rowsift/csv - CSV input and output for the rowsift pipeline.
 *
 * Reading is lazy and per file; writing happens once, after every input
 * has been consumed and the output schema is final.
 */

export type { ReadCsvOptions } from "./reader.js";
export { readCsvRows } from "./reader.js";
export { formatCsv, writeCsv } from "./writer.js";
export type { InputListing } from "./inputs.js";
export { listCsvFiles, listInputFiles } from "./inputs.js";
