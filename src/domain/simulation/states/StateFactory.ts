import { FormKind } from "../../../shared/constants/ModeEnums";
import type { FormState } from "./FormState";
import type { SimulationContext } from "./SimulationContext";
import { ContinueOnTrailState } from "./ContinueOnTrailState";
import { CheckSuppliesState } from "./CheckSuppliesState";
import { LocationFork } from "./LocationFork";
import { LocationDepart } from "./LocationDepart";
import { LookAtMap } from "./LookAtMap";

export function createForm(kind: FormKind, context: SimulationContext): FormState {
  switch (kind) {
    case FormKind.CONTINUE_ON_TRAIL:
      return new ContinueOnTrailState(context);
    case FormKind.CHECK_SUPPLIES:
      return new CheckSuppliesState(context);
    case FormKind.LOCATION_FORK:
      return new LocationFork(context);
    case FormKind.LOCATION_DEPART:
      return new LocationDepart(context);
    case FormKind.LOOK_AT_MAP:
      return new LookAtMap(context);
  }
}
