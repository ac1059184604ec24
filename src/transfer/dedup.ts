import type { Row } from "../core/schema";

const SIGNATURE_DELIMITER = "\u001f";

/**
 * Canonical form of a row for exact duplicate detection.
 *
 * Trailing empty cells are dropped: the Sheets API omits them when a row is read back,
 * so a row must have the same signature before and after it is written.
 */
export const rowSignature = (row: Row): string => {
  let end = row.length;
  while (end > 0 && row[end - 1] === "") {
    end--;
  }
  return row.slice(0, end).join(SIGNATURE_DELIMITER);
};

/**
 * Drop candidates already present at the destination, and repeats within the batch.
 * The first occurrence wins.
 */
export const removeDuplicates = (
  candidates: ReadonlyArray<Row>,
  destinationRows: ReadonlyArray<Row>
): ReadonlyArray<Row> => {
  const seen = new Set(destinationRows.map(rowSignature));

  return candidates.filter((row) => {
    const signature = rowSignature(row);
    if (seen.has(signature)) {
      return false;
    }
    seen.add(signature);
    return true;
  });
};
