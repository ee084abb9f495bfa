import { Inject, Injectable, Optional } from "@nestjs/common";
import { BehaviorSubject, Observable, distinctUntilChanged } from "rxjs";
import { isDeepStrictEqual } from "util";
import type { SwitchboardConfig } from "@switchboard/types";
import { DEFAULT_CONFIG } from "./defaults";
import { INITIAL_CONFIG_TOKEN } from "./config.const";

@Injectable()
export class ConfigStore {
  private static snapshotsMatch(
    previous: SwitchboardConfig,
    next: SwitchboardConfig,
  ): boolean {
    return isDeepStrictEqual(previous, next);
  }

  private readonly subject: BehaviorSubject<SwitchboardConfig>;

  readonly changes$: Observable<SwitchboardConfig>;

  constructor(
    @Optional()
    @Inject(INITIAL_CONFIG_TOKEN)
    initialConfig?: SwitchboardConfig,
  ) {
    const seed = initialConfig ?? DEFAULT_CONFIG;
    this.subject = new BehaviorSubject<SwitchboardConfig>(structuredClone(seed));
    this.changes$ = this.subject
      .asObservable()
      .pipe(distinctUntilChanged(ConfigStore.snapshotsMatch));
  }

  setSnapshot(snapshot: SwitchboardConfig): void {
    this.subject.next(structuredClone(snapshot));
  }

  getSnapshot(): SwitchboardConfig {
    return structuredClone(this.subject.getValue());
  }
}
