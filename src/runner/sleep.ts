export type Sleep = (ms: number) => Promise<void>;

/** Plain timed wait. Not cancellable: stops are observed between steps. */
export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
