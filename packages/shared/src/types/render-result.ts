/**
 * Structural problems that stop rendering
 */
export type DiagnosticCode =
  | "missing-interfaces"
  | "invalid-lease-database"
  | "missing-subnets";

/**
 * Document section a diagnostic refers to
 */
export type DocumentSection = "interfaces-config" | "lease-database" | "subnet4";

export interface RenderDiagnostic {
  readonly code: DiagnosticCode;
  readonly section: DocumentSection;
  readonly message: string;
}

/**
 * Outcome of rendering part of the model.
 * An incomplete document must not be handed to the DHCP server.
 */
export type RenderResult<T> =
  | { complete: true; document: T }
  | { complete: false; document: T; diagnostic: RenderDiagnostic };
