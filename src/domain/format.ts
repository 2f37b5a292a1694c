import type { ToStringOptions } from "yaml";

// Mappings indent by two; sequence dashes sit two spaces under their key with
// item content at four. Quote style comes from each scalar node.
export const YAML_OUTPUT_OPTIONS = {
  indent: 2,
  indentSeq: true,
  lineWidth: 0,
} satisfies ToStringOptions;

export const MODELS_KEY = "models";
export const SOURCES_KEY = "sources";
export const COLUMNS_KEY = "columns";
export const NAME_KEY = "name";
export const DESCRIPTION_KEY = "description";
