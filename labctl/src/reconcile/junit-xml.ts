import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";

export type TestFailure = {
  name: string;
  message: string;
  stacktrace?: string;
};

export type TestResult = {
  pass: boolean;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  failures: TestFailure[];
};

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function toFailure(name: string, entry: unknown): TestFailure {
  if (typeof entry === "string") return { name, message: entry };
  if (!isNode(entry)) return { name, message: "" };
  const text = typeof entry["#text"] === "string" ? entry["#text"] : undefined;
  return { name, message: attr(entry, "message") ?? text ?? "", stacktrace: text };
}

/**
 * Parse JUnit XML and convert to normalized TestResult.
 */
export function parseJunitXml(xmlContent: string): TestResult {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
  });

  const parsed: unknown = parser.parse(xmlContent);
  const root = isNode(parsed) ? parsed : {};

  // Handle both <testsuites> wrapper and single <testsuite>
  const wrapper = root.testsuites;
  const suites = asList(isNode(wrapper) ? wrapper.testsuite : root.testsuite).filter(isNode);

  let total = 0;
  let failed = 0;
  let skipped = 0;
  let durationSec = 0;
  const failures: TestFailure[] = [];

  for (const suite of suites) {
    total += parseInt(attr(suite, "tests") ?? "0", 10);
    failed += parseInt(attr(suite, "failures") ?? "0", 10) + parseInt(attr(suite, "errors") ?? "0", 10);
    skipped += parseInt(attr(suite, "skipped") ?? "0", 10);
    durationSec += parseFloat(attr(suite, "time") ?? "0");

    for (const tc of asList(suite.testcase).filter(isNode)) {
      const tcName = attr(tc, "name") ?? "unknown";
      const tcClass = attr(tc, "classname") ?? "";
      const fullName = tcClass ? `${tcClass}.${tcName}` : tcName;

      for (const f of asList(tc.failure)) failures.push(toFailure(fullName, f));
      for (const e of asList(tc.error)) failures.push(toFailure(fullName, e));
    }
  }

  return {
    pass: failed === 0,
    total,
    passed: Math.max(0, total - failed - skipped),
    failed,
    skipped,
    duration_ms: Math.round(durationSec * 1000),
    failures,
  };
}

/** Read a JUnit XML file and return normalized TestResult. */
export function parseJunitXmlFile(filePath: string): TestResult {
  const content = fs.readFileSync(filePath, "utf8");
  return parseJunitXml(content);
}
