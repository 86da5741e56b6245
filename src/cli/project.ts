#!/usr/bin/env node
import { stringify } from "csv-stringify";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { loadSchemaFile, validateSqlName } from "../config";
import { csvOptions } from "../http/output-formatters";
import { PostgresTableSource } from "../postgres/postgres-table-source";
import { FieldProjector } from "../projection/field-projector";
import { distinctFields, FilterInput, parseFieldList, ResultSet } from "../projection/field-request";
import { createSchema } from "../projection/schema";
import { createPool } from "../projector-server";

type OutputFormat = "json" | "ndjson" | "csv";

async function projectRows(connection: string, schemaFilePath: string, fields: string[], filters: FilterInput, format: OutputFormat) {
  const schemaFile = loadSchemaFile(schemaFilePath);
  const schema = createSchema(schemaFile.columns);
  const pgSchema = validateSqlName(schemaFile.schema, "schema", "public");
  const relation = validateSqlName(schemaFile.relation, "relation");

  const pool = createPool(connection, {});
  try {
    const projector = new FieldProjector(schema, new PostgresTableSource(pool, pgSchema, relation));
    const rows = await projector.project(fields, { filters });
    process.stdout.write(await formatRows(rows, distinctFields(fields), format));
  }
  finally {
    await pool.end();
  }
}

function formatRows(rows: ResultSet, fields: string[], format: OutputFormat): Promise<string> {
  switch (format) {
    case "json":
      return Promise.resolve(JSON.stringify(rows, null, 2) + "\n");
    case "ndjson":
      return Promise.resolve(rows.map(row => JSON.stringify(row) + "\n").join(""));
    case "csv":
      return new Promise((resolve, reject) => {
        stringify(rows, csvOptions(fields), (err, output) => {
          if (err) {
            reject(err);
          }
          else {
            resolve(output);
          }
        });
      });
  }
}

function parseFilterArguments(values: string[]): FilterInput {
  const filters: FilterInput = {};
  for (const value of values) {
    const separator = value.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Filters must be written as name=value, but got "${value}".`);
    }
    filters[value.substring(0, separator)] = value.substring(separator + 1);
  }
  return filters;
}

const argv = yargs(hideBin(process.argv))
  .option("connection", {
    alias: "c",
    type: "string",
    description: "Postgres connection string",
    demandOption: true,
  })
  .option("schema-file", {
    alias: "s",
    type: "string",
    description: "Path to the JSON file describing the relation and its columns",
    demandOption: true,
  })
  .option("fields", {
    alias: "f",
    type: "string",
    array: true,
    description: "Fields to select, comma-separated or repeated",
    demandOption: true,
  })
  .option("filter", {
    type: "string",
    array: true,
    default: [] as string[],
    description: "Equality filter written as name=value; may be repeated",
  })
  .option("format", {
    choices: ["json", "ndjson", "csv"] as const,
    default: "json" as const,
    description: "Output format",
  })
  .strict()
  .help()
  .alias("help", "h")
  .parseSync();

Promise.resolve()
  .then(() => projectRows(
    argv.connection,
    argv["schema-file"],
    parseFieldList(argv.fields),
    parseFilterArguments(argv.filter),
    argv.format))
  .catch((error) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
