export interface ReferenceToken {
  /** Literal text as found, e.g. `#482`. */
  token: string;
  sourceId: number;
}

export interface ReferenceLocation {
  repository: string;
  issueNumber: number;
  /** Undefined when the text is the issue body itself. */
  commentId?: number;
}

export interface DeferredReference extends ReferenceLocation {
  text: string;
  tokens: ReferenceToken[];
}

export interface UnresolvedReference {
  location: ReferenceLocation;
  token: string;
  sourceId: number;
}
