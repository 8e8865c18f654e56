import * as cheerio from "cheerio";
import { logger } from "../logger.js";
import { ExtractionResult, LIFECYCLE_STATUSES, LifecycleStatus, Status } from "../types.js";

export type StatusCandidate = {
  phrase: string;
  status: LifecycleStatus;
};

// Scanned top to bottom; the last phrase found in the page wins, so entries
// are grouped by lifecycle phase and go from generic to specific.
export const STATUS_CANDIDATES: readonly StatusCandidate[] = [
  { phrase: "создан", status: "created" },
  { phrase: "передается в доставку", status: "handed to carrier" },
  { phrase: "передано в доставку", status: "handed to carrier" },
  { phrase: "заказ принят перевозчиком", status: "handed to carrier" },
  { phrase: "handed over to carrier", status: "handed to carrier" },
  { phrase: "в пути", status: "in transit" },
  { phrase: "заказ везут", status: "in transit" },
  { phrase: "in transit", status: "in transit" },
  { phrase: "заказ везут на таможню в стране отправления", status: "outbound customs" },
  { phrase: "экспортного таможенного оформления", status: "outbound customs" },
  { phrase: "на таможне", status: "inbound customs" },
  { phrase: "customs clearance", status: "inbound customs" },
  { phrase: "заказ везут на таможню в стране назначения", status: "inbound customs" },
  { phrase: "заказ привезли в страну назначения", status: "inbound customs" },
  { phrase: "заказ передан на импортное таможенное оформление", status: "inbound customs" },
  { phrase: "заказ проходит импортное таможенное оформление", status: "inbound customs" },
  { phrase: "выпущен импортной таможней", status: "inbound customs" },
  { phrase: "сортировочный терминал", status: "at sortation" },
  { phrase: "sorting center", status: "at sortation" },
  { phrase: "заказ ожидает отправки в город получателя", status: "at sortation" },
  { phrase: "в городе получателя", status: "out for delivery" },
  { phrase: "заказ везут в город получателя", status: "out for delivery" },
  { phrase: "передан курьеру", status: "out for delivery" },
  { phrase: "заказ передали в курьерскую доставку", status: "out for delivery" },
  { phrase: "out for delivery", status: "out for delivery" },
  { phrase: "на пункте выдачи", status: "ready for pickup" },
  { phrase: "готов к выдаче", status: "ready for pickup" },
  { phrase: "готово к выдаче", status: "ready for pickup" },
  { phrase: "ready for pickup", status: "ready for pickup" },
  { phrase: "доставлен", status: "delivered" },
  { phrase: "получено", status: "delivered" },
  { phrase: "вручен", status: "delivered" },
  { phrase: "delivered", status: "delivered" }
];

// Challenge wording only: a bare "captcha" also hits reCAPTCHA footers on ordinary pages.
export const BLOCKED_INDICATORS: readonly string[] = [
  "enter the captcha",
  "solve the captcha",
  "complete the captcha",
  "введите символы",
  "введите код с картинки",
  "вы не робот",
  "are you a robot",
  "i'm not a robot",
  "please verify you are a human",
  "checking your browser",
  "доступ ограничен",
  "доступ запрещен",
  "access denied",
  "access restricted",
  "too many requests",
  "слишком много запросов"
];

type PageText = {
  visibleText: string;
  structuredLeaves: string[];
};

export function extractStatus(pageContent: string): ExtractionResult {
  try {
    const page = readPage(pageContent);
    const visible = normalizeText(page.visibleText);

    const indicator = BLOCKED_INDICATORS.find((phrase) => visible.includes(phrase));
    if (indicator) {
      return { status: "blocked", reason: "blocked", detail: indicator };
    }

    const sources = [normalizeText(page.structuredLeaves.join(" ")), visible];
    for (const source of sources) {
      const candidate = lastCandidateIn(source);
      if (candidate) {
        return { status: candidate.status, reason: "matched", detail: candidate.phrase };
      }
    }
  } catch (error) {
    logger.warn({ err: error }, "status extraction failed on malformed page");
  }

  return { status: "unknown", reason: "no-match" };
}

export function matchStatus(text: string): StatusCandidate | undefined {
  return lastCandidateIn(normalizeText(text));
}

export function normalizeText(text: string): string {
  return text
    .replace(/<[^>]*>/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase()
    .replace(/ё/g, "е");
}

export function isLifecycleStatus(value: Status | null | undefined): value is LifecycleStatus {
  return LIFECYCLE_STATUSES.some((s) => s === value);
}

function lastCandidateIn(normalized: string): StatusCandidate | undefined {
  if (!normalized) {
    return undefined;
  }

  let found: StatusCandidate | undefined;
  for (const candidate of STATUS_CANDIDATES) {
    if (normalized.includes(candidate.phrase)) {
      found = candidate;
    }
  }
  return found;
}

function readPage(content: string): PageText {
  const whole = parseJsonLike(content);
  if (whole !== undefined) {
    const leaves = collectStringLeaves(whole);
    return { visibleText: leaves.join(" "), structuredLeaves: leaves };
  }

  const $ = cheerio.load(content);
  const structuredLeaves: string[] = [];
  $("script").each((_, el) => {
    for (const embedded of parseEmbeddedData($(el).text())) {
      structuredLeaves.push(...collectStringLeaves(embedded));
    }
  });

  $("script, style, noscript, template").remove();
  // Keeps sibling blocks from being glued into one word by .text().
  $("body *").append(" ");
  const body = $("body");
  const visibleText = body.length > 0 ? body.text() : $.root().text();

  return { visibleText, structuredLeaves };
}

function parseJsonLike(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

// Bare JSON script bodies, or every `name = {...}` assignment in the script.
function parseEmbeddedData(scriptText: string): unknown[] {
  const direct = parseJsonLike(scriptText);
  if (direct !== undefined) {
    return [direct];
  }

  const found: unknown[] = [];
  let from = 0;
  for (;;) {
    const eq = scriptText.indexOf("=", from);
    if (eq === -1) {
      return found;
    }
    from = eq + 1;

    const start = skipWhitespace(scriptText, eq + 1);
    const open = scriptText[start];
    if (open !== "{" && open !== "[") {
      continue;
    }
    const end = balancedEnd(scriptText, start);
    if (end === -1) {
      continue;
    }
    const value = parseJsonLike(scriptText.slice(start, end + 1));
    if (value !== undefined) {
      found.push(value);
      from = end + 1;
    }
  }
}

function skipWhitespace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text.charAt(i))) {
    i += 1;
  }
  return i;
}

// Index of the bracket closing the one at `start`, ignoring brackets inside string literals.
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let quote: string | undefined;

  for (let i = start; i < text.length; i += 1) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === "\\") {
        i += 1;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{" || ch === "[") {
      depth += 1;
    } else if (ch === "}" || ch === "]") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function collectStringLeaves(root: unknown): string[] {
  const leaves: string[] = [];
  const stack: unknown[] = [root];

  while (stack.length > 0) {
    const value = stack.pop();
    if (typeof value === "string") {
      if (value.trim()) {
        leaves.push(value);
      }
    } else if (Array.isArray(value)) {
      for (let i = value.length - 1; i >= 0; i -= 1) {
        stack.push(value[i]);
      }
    } else if (typeof value === "object" && value !== null) {
      stack.push(...Object.values(value).reverse());
    }
  }

  return leaves;
}
