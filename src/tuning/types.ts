export type TuningParameter = {
  /** UTC calendar day the version takes effect, `YYYY-MM-DD`. */
  effectiveDate: string;
  name: string;
  value: number;
  description?: string;
  createdAt: string;
};

/** Resolved name → value mapping, as frozen onto a run. */
export type ParameterSnapshot = Readonly<Record<string, number>>;

export type ParameterStore = {
  getCurrent: (
    asOf: Date | string,
    options?: { required?: readonly string[] },
  ) => Promise<ParameterSnapshot>;
  writeNewVersion: (params: {
    date: Date | string;
    name: string;
    value: number;
    description?: string;
  }) => Promise<TuningParameter>;
  listHistory: (name: string) => Promise<TuningParameter[]>;
  listParameters: () => Promise<TuningParameter[]>;
};
