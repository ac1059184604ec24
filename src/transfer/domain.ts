import { Option } from "effect";
import type { Row } from "../core/schema";

// Characters that end up in front of links pasted from chats and forms
const LEADING_NOISE = /^[@#"'\s,;]+/;
const SCHEME = /^https?:\/\//;
const AUTHORITY_END = /[/?#\s"',;]/;
const TOKEN_SEPARATOR = /[\s"',;]+/;

const normalizeDomain = (domain: string): string =>
  domain.trim().toLowerCase().replace(/^www\./, "").replace(/\.$/, "");

/**
 * Extract the lower-cased host of a URL-ish cell, without scheme, userinfo, port or `www.`.
 */
export const extractHost = (url: string): Option.Option<string> => {
  const withoutScheme = url.trim().replace(LEADING_NOISE, "").toLowerCase().replace(SCHEME, "");
  const authority = withoutScheme.split(AUTHORITY_END)[0] ?? "";
  const host = authority
    .slice(authority.lastIndexOf("@") + 1)
    .replace(/:\d*$/, "")
    .replace(/\.$/, "")
    .replace(/^www\./, "");

  return host.length > 0 ? Option.some(host) : Option.none();
};

/**
 * True when a link in the cell has `domain` or one of its subdomains as its host.
 * Matching is on host boundaries: `notforum-info.ru` is not `forum-info.ru`.
 * The cell is split on whitespace, quotes, `,` and `;`, so text around the link is ignored.
 */
export const matchesDomain = (url: string, domain: string): boolean => {
  const target = normalizeDomain(domain);
  if (target.length === 0) {
    return false;
  }

  return url
    .split(TOKEN_SEPARATOR)
    .some((token) =>
      Option.exists(extractHost(token), (host) => host === target || host.endsWith(`.${target}`))
    );
};

/**
 * Domain test against the cell at `urlColumn`. Rows too short for the column never match.
 */
export const matchesRow = (row: Row, urlColumn: number, domain: string): boolean => {
  if (!Number.isInteger(urlColumn) || urlColumn < 0 || urlColumn >= row.length) {
    return false;
  }
  const cell = row[urlColumn];
  return typeof cell === "string" && matchesDomain(cell, domain);
};
