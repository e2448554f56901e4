/**
 * Non-fatal events reported while loading or merging datasets
 */
export type DatabaseDiagnostic =
  | {
      kind: 'duplicate-volcanoes';
      message: string;
      /** Pleistocene records dropped in favour of Holocene ones */
      count: number;
      /** Lowest colliding volcano numbers, ascending, at most ten */
      volcanoNumbers: number[];
    }
  | {
      kind: 'missing-file';
      message: string;
      path: string;
    }
  | {
      kind: 'skipped-row';
      message: string;
      path: string;
      row: number;
    };

export type DiagnosticSink = (diagnostic: DatabaseDiagnostic) => void;
