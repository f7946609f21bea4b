import { z } from "zod";
import { CatalogFormatError, ConceptGraph, InMemoryCatalog } from "@practice/core";
import type { Item, PrerequisiteMap, TestCase } from "@practice/core";
import { cell, parseCsvRecords } from "./csv";

export const DEFAULT_GUESSING = 0.25;

export const ITEM_COLUMNS = [
  "id",
  "name",
  "topic",
  "discrimination",
  "difficulty",
  "guessing",
  "description"
] as const;

export const PREREQUISITE_COLUMNS = ["concept", "prerequisite"] as const;

const numeric = z
  .string()
  .min(1, "is required")
  .transform(Number)
  .pipe(z.number({ invalid_type_error: "must be a number" }).finite("must be a number"));

const ItemRowSchema = z.object({
  id: z.string().min(1, "is required"),
  name: z.string(),
  topic: z.string().min(1, "is required"),
  discrimination: numeric.pipe(z.number().positive("must be positive")),
  difficulty: numeric,
  guessing: z
    .string()
    .transform(value => (value === "" ? DEFAULT_GUESSING : Number(value)))
    .pipe(z.number().min(0, "must be at least 0").lt(1, "must be below 1")),
  description: z.string()
});

const TestCaseSchema = z.object({
  input: z.unknown(),
  output: z.unknown(),
  unordered: z.boolean().optional()
});

const BankQuestionSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  topic: z.string().min(1).optional(),
  description: z.string().default(""),
  alpha: z.number().positive(),
  beta: z.number().finite(),
  c: z.number().min(0).lt(1).default(DEFAULT_GUESSING),
  tests: z.array(TestCaseSchema).default([]),
  hidden_tests: z.array(TestCaseSchema).default([]),
  init_code: z.string().optional()
});

const ItemBankSchema = z.object({
  topic: z.string().min(1).optional(),
  questions: z.array(BankQuestionSchema)
});

export interface CatalogBundle {
  catalog: InMemoryCatalog;
  prerequisites: PrerequisiteMap;
  /** Concepts in the order they first appear; used as the canonical order */
  order: string[];
  graph: ConceptGraph;
}

export interface CatalogSources {
  itemsCsv: string;
  prerequisitesCsv: string;
}

const formatZodIssues = (prefix: string, error: z.ZodError): string[] =>
  error.issues.map(issue => `${prefix}${issue.path.join(".")} ${issue.message}`);

const toTestCases = (tests: z.infer<typeof TestCaseSchema>[]): TestCase[] =>
  tests.map(({ input, output, unordered }) => ({
    input,
    output,
    ...(unordered !== undefined ? { unordered } : {})
  }));

export const parseItemsCsv = (text: string): Item[] => {
  const items: Item[] = [];
  const issues: string[] = [];
  const seen = new Set<string>();

  parseCsvRecords(text, ITEM_COLUMNS, "items").forEach((record, index) => {
    const row = ItemRowSchema.safeParse({
      id: cell(record, "id"),
      name: cell(record, "name"),
      topic: cell(record, "topic"),
      discrimination: cell(record, "discrimination"),
      difficulty: cell(record, "difficulty"),
      guessing: cell(record, "guessing"),
      description: cell(record, "description")
    });
    if (!row.success) {
      issues.push(...formatZodIssues(`row ${index + 1}: `, row.error));
      return;
    }
    if (seen.has(row.data.id)) {
      issues.push(`row ${index + 1}: duplicate item id "${row.data.id}"`);
      return;
    }
    seen.add(row.data.id);
    items.push({
      ...row.data,
      name: row.data.name || row.data.id,
      visibleTests: [],
      hiddenTests: []
    });
  });

  if (issues.length > 0) {
    throw new CatalogFormatError("Invalid items CSV", issues);
  }
  return items;
};

/**
 * Reads `concept,prerequisite` rows. A row with an empty prerequisite
 * declares a concept without prerequisites.
 */
export const parsePrerequisitesCsv = (
  text: string
): Pick<CatalogBundle, "prerequisites" | "order"> => {
  const prerequisites: PrerequisiteMap = {};
  const order: string[] = [];
  const issues: string[] = [];

  const remember = (concept: string) => {
    if (!order.includes(concept)) {
      order.push(concept);
    }
  };

  parseCsvRecords(text, PREREQUISITE_COLUMNS, "prerequisites").forEach((record, index) => {
    const concept = cell(record, "concept");
    const prerequisite = cell(record, "prerequisite");
    if (!concept) {
      issues.push(`row ${index + 1}: concept is required`);
      return;
    }
    if (prerequisite === concept) {
      issues.push(`row ${index + 1}: "${concept}" cannot be its own prerequisite`);
      return;
    }

    remember(concept);
    const list = prerequisites[concept] ?? [];
    if (prerequisite && !list.includes(prerequisite)) {
      list.push(prerequisite);
    }
    prerequisites[concept] = list;
  });

  if (issues.length > 0) {
    throw new CatalogFormatError("Invalid prerequisites CSV", issues);
  }
  return { prerequisites, order };
};

/**
 * JSON question bank: `{ topic?, questions: [{ name, alpha, beta, c?, tests?,
 * hidden_tests?, ... }] }`. The question name doubles as the id when no id is
 * given.
 */
export const parseItemBankJson = (text: string): Item[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new CatalogFormatError(
      "Invalid item bank JSON",
      [error instanceof Error ? error.message : String(error)]
    );
  }

  const bank = ItemBankSchema.safeParse(payload);
  if (!bank.success) {
    throw new CatalogFormatError("Invalid item bank JSON", formatZodIssues("", bank.error));
  }

  const issues: string[] = [];
  const items: Item[] = [];
  bank.data.questions.forEach((question, index) => {
    const topic = question.topic ?? bank.data.topic;
    if (!topic) {
      issues.push(`questions.${index} has no topic`);
      return;
    }
    items.push({
      id: question.id ?? question.name,
      name: question.name,
      topic,
      description: question.description,
      discrimination: question.alpha,
      difficulty: question.beta,
      guessing: question.c,
      visibleTests: toTestCases(question.tests),
      hiddenTests: toTestCases(question.hidden_tests),
      ...(question.init_code !== undefined ? { initCode: question.init_code } : {})
    });
  });

  if (issues.length > 0) {
    throw new CatalogFormatError("Invalid item bank JSON", issues);
  }
  return items;
};

/** Builds the catalog and the concept graph; a cyclic prerequisite file throws. */
export const loadCatalogFromCsv = ({ itemsCsv, prerequisitesCsv }: CatalogSources): CatalogBundle => {
  const catalog = new InMemoryCatalog(parseItemsCsv(itemsCsv));
  const { prerequisites, order } = parsePrerequisitesCsv(prerequisitesCsv);
  catalog.topics().forEach(topic => {
    if (!order.includes(topic)) {
      order.push(topic);
    }
  });

  return { catalog, prerequisites, order, graph: new ConceptGraph(prerequisites, order) };
};
