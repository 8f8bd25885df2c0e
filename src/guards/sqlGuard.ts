import { ValidationError } from "../errors";

export const FORBIDDEN_KEYWORDS = [
  "insert",
  "update",
  "delete",
  "drop",
  "truncate",
  "alter",
  "create",
  "grant",
  "revoke",
] as const;

export type ValidationVerdict = { accepted: true } | { accepted: false; reason: string };

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_$]/.test(ch);
}

/**
 * Removes comments and blanks the contents of string literals and quoted
 * identifiers, leaving only the SQL that would be parsed as code. Literals
 * become `''`, quoted identifiers `""`, comments a single space.
 */
export function stripLiteralsAndComments(sql: string): string {
  let out = "";
  let i = 0;
  const n = sql.length;

  while (i < n) {
    const ch = sql[i];
    const next = sql[i + 1];

    // the server ends a line comment at either \n or \r
    if (ch === "-" && next === "-") {
      i += 2;
      while (i < n && sql[i] !== "\n" && sql[i] !== "\r") i++;
      out += " ";
      continue;
    }

    if (ch === "/" && next === "*") {
      let depth = 1;
      i += 2;
      while (i < n && depth > 0) {
        if (sql[i] === "/" && sql[i + 1] === "*") {
          depth++;
          i += 2;
        } else if (sql[i] === "*" && sql[i + 1] === "/") {
          depth--;
          i += 2;
        } else {
          i++;
        }
      }
      out += " ";
      continue;
    }

    if (ch === "'") {
      const escapes = (sql[i - 1] === "e" || sql[i - 1] === "E") && !isIdentChar(sql[i - 2]);
      i++;
      while (i < n) {
        if (escapes && sql[i] === "\\") {
          i += 2;
        } else if (sql[i] === "'") {
          if (sql[i + 1] === "'") {
            i += 2;
          } else {
            i++;
            break;
          }
        } else {
          i++;
        }
      }
      out += "''";
      continue;
    }

    if (ch === '"') {
      i++;
      while (i < n) {
        if (sql[i] === '"') {
          if (sql[i + 1] === '"') {
            i += 2;
          } else {
            i++;
            break;
          }
        } else {
          i++;
        }
      }
      out += '""';
      continue;
    }

    if (ch === "$" && !isIdentChar(sql[i - 1])) {
      const m = DOLLAR_TAG.exec(sql.slice(i));
      if (m) {
        const tag = m[0];
        const end = sql.indexOf(tag, i + tag.length);
        i = end === -1 ? n : end + tag.length;
        out += "''";
        continue;
      }
    }

    out += ch;
    i++;
  }
  return out;
}

function reject(reason: string): ValidationVerdict {
  return { accepted: false, reason };
}

/**
 * Lexical read-only check. Accepts a single SELECT or WITH statement that
 * contains none of the forbidden keywords as a whole word outside literals
 * and comments.
 */
export class QueryValidator {
  readonly keywords: readonly string[];
  private readonly banned: RegExp;

  constructor(extraKeywords: readonly string[] = []) {
    for (const k of extraKeywords) {
      if (!/^[A-Za-z_]+$/.test(k)) throw new Error(`Invalid forbidden keyword: "${k}"`);
    }
    this.keywords = [...new Set([...FORBIDDEN_KEYWORDS, ...extraKeywords.map((k) => k.toLowerCase())])];
    this.banned = new RegExp(`\\b(${this.keywords.join("|")})\\b`, "i");
  }

  validate(sql: string): ValidationVerdict {
    if (!sql.trim()) return reject("empty query");

    const code = stripLiteralsAndComments(sql).replace(/[\s;]+$/, "").trim();
    if (!code) return reject("empty query");
    if (!/^\(*\s*(SELECT|WITH)\b/i.test(code)) return reject("not a read query");
    if (code.includes(";")) return reject("multiple statements are not allowed");

    const hit = this.banned.exec(code);
    if (hit) return reject(`Query contains forbidden keyword: ${hit[1].toLowerCase()}`);
    return { accepted: true };
  }

  assertReadOnly(sql: string): void {
    const verdict = this.validate(sql);
    if (!verdict.accepted) throw new ValidationError(verdict.reason);
  }
}
