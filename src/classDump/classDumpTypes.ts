export type MethodRecord = {
  selector: string;
  /** Raw runtime type encoding, brackets removed. */
  encoding: string;
};

export type PropertyRecord = {
  name: string;
  /** Raw attribute string, e.g. `T@"NSString",R,C,N`. */
  attributes: string;
};

export type ClassRecord = {
  name: string;
  superclass?: string;
  methods: MethodRecord[];
  properties: PropertyRecord[];
};
