import type { Option } from "effect";
import type { Row } from "../core/schema";
import { isNewer } from "./cursor";
import { matchesRow } from "./domain";

export interface SelectionCriteria {
  readonly domain: string;
  readonly urlColumn: number;
  readonly cursor: Option.Option<Date>;
}

export interface SelectionSummary {
  readonly candidates: ReadonlyArray<Row>;
  readonly outsideDomain: number;
  readonly notNewer: number;
}

/**
 * Split source rows into candidates and the reasons the others were dropped.
 * Source order is preserved; rows are never copied or modified.
 */
export const summarizeSelection = (
  sourceRows: ReadonlyArray<Row>,
  criteria: SelectionCriteria
): SelectionSummary => {
  const candidates: Row[] = [];
  let outsideDomain = 0;
  let notNewer = 0;

  for (const row of sourceRows) {
    if (!matchesRow(row, criteria.urlColumn, criteria.domain)) {
      outsideDomain++;
    } else if (!isNewer(row, criteria.cursor)) {
      notNewer++;
    } else {
      candidates.push(row);
    }
  }

  return { candidates, outsideDomain, notNewer };
};

export const selectCandidates = (
  sourceRows: ReadonlyArray<Row>,
  criteria: SelectionCriteria
): ReadonlyArray<Row> => summarizeSelection(sourceRows, criteria).candidates;
