// Declaration types - already-structured input produced by a text parser

/**
 * One attribute line of an entity block, e.g. "Lokacja: Erathia (2021-01:)".
 * Indented lines below it arrive as `continuation`.
 */
export type AttributeLine = {
  text: string;
  continuation?: string[];
};

/**
 * A single entity block within a section.
 */
export type EntityDeclaration = {
  name: string;
  lines: AttributeLine[];
};

/**
 * A group of entity blocks under one header. The label decides the type.
 */
export type DeclarationSection = {
  label: string;
  entities: EntityDeclaration[];
};

/**
 * One declaration file. Sources are merged in the order the caller lists
 * them, lowest precedence first.
 */
export type DeclarationSource = {
  id: string;
  sections: DeclarationSection[];
};
