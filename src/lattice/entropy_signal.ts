export type EntropySample = {
  value: number;
  version: number;
  publishedAtMs: number;
};

/**
 * Latest published entropy value.
 *
 * The governor is the only writer; display readers take a copy of the sample
 * and never see the lattice itself.
 */
export class EntropySignal {
  private sample: EntropySample;

  constructor(initial = 0, private readonly now: () => number = Date.now) {
    this.sample = { value: initial, version: 0, publishedAtMs: now() };
  }

  publish(value: number): EntropySample {
    this.sample = {
      value,
      version: this.sample.version + 1,
      publishedAtMs: this.now(),
    };
    return this.sample;
  }

  read(): EntropySample {
    return { ...this.sample };
  }

  get version(): number {
    return this.sample.version;
  }
}
