/**
 * Section entity: one heading-scoped unit of extracted page content.
 * Sections are produced while a page is traversed and are consumed
 * immediately by the record builder; they are never persisted.
 */
export interface Section {
  /** Heading titles from the document root to this section, outermost first */
  headingPath: string[];

  /** Fragment identifier (including the leading '#'), when one is derivable */
  anchor?: string;

  /** Cleaned plain-text body */
  content: string;
}
