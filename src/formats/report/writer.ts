/**
 * @module formats/report/writer
 * @description CSV report of filtered hits joined with KO and symbol annotations
 *
 * Column order and number formats are fixed:
 * - `full_evalue` as `%.2e`
 * - `full_score` as `%.2f`
 * - `modelcov` and `seqcov` as `%.4f`
 *
 * Rows follow the order of the hits given; nothing is sorted.
 */

import { openForWriting } from "../../io/file-writer";
import type { Annotations, CoveredHit, WriteOptions } from "../../types";
import { lookupAnnotation } from "../annotation/loader";
import { escapeCsvField, formatExponential, formatFixed } from "./format";

export const REPORT_COLUMNS = [
  "target",
  "query",
  "full_evalue",
  "full_score",
  "modelcov",
  "seqcov",
  "KO",
  "symbol",
] as const;

const DELIMITER = ",";
const LINE_ENDING = "\n";

/**
 * HitReportWriter - formats and writes the hit report
 *
 * @example
 * ```typescript
 * const writer = new HitReportWriter();
 * await writer.writeFile("sample.filtered.csv", hits, { ko, symbol });
 * ```
 */
export class HitReportWriter {
  /**
   * Header line without terminator
   */
  formatHeader(): string {
    return REPORT_COLUMNS.join(DELIMITER);
  }

  /**
   * Format one hit as a CSV line without terminator
   */
  formatHit(hit: CoveredHit, annotations: Annotations): string {
    const fields = [
      escapeCsvField(hit.target, DELIMITER),
      escapeCsvField(hit.query, DELIMITER),
      formatExponential(hit.fullEvalue, 2),
      formatFixed(hit.fullScore, 2),
      formatFixed(hit.modelCoverage, 4),
      formatFixed(hit.seqCoverage, 4),
      escapeCsvField(lookupAnnotation(annotations.ko, hit.query), DELIMITER),
      escapeCsvField(lookupAnnotation(annotations.symbol, hit.query), DELIMITER),
    ];
    return fields.join(DELIMITER);
  }

  /**
   * Format the whole report; every line, the last included, ends in `\n`
   */
  formatReport(hits: Iterable<CoveredHit>, annotations: Annotations): string {
    const lines = [this.formatHeader()];
    for (const hit of hits) {
      lines.push(this.formatHit(hit, annotations));
    }
    return lines.join(LINE_ENDING) + LINE_ENDING;
  }

  /**
   * Write the report to `path`, one row at a time
   *
   * @returns Number of data rows written
   * @throws {FileError} If the destination cannot be opened or written
   */
  async writeFile(
    path: string,
    hits: Iterable<CoveredHit> | AsyncIterable<CoveredHit>,
    annotations: Annotations,
    options: WriteOptions = {}
  ): Promise<number> {
    return openForWriting(
      path,
      async (handle) => {
        let rows = 0;
        await handle.writeString(this.formatHeader() + LINE_ENDING);
        for await (const hit of hits) {
          await handle.writeString(this.formatHit(hit, annotations) + LINE_ENDING);
          rows++;
        }
        return rows;
      },
      options
    );
  }
}
