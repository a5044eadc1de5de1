import { FormKind } from "../../../shared/constants/ModeEnums";
import { ItemKind } from "../../../shared/constants/VehicleEnums";
import { DialogState } from "./DialogState";
import { Transitions, type StateTransition } from "./transitions";

const NAME_COLUMN_WIDTH = 15;
const QUANTITY_COLUMN_WIDTH = 3;

const currencyFormat = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
});
const countFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/**
 * Read-only listing of everything in the wagon.
 */
export class CheckSuppliesState extends DialogState {
  public readonly kind = FormKind.CHECK_SUPPLIES;

  protected onDialogPrompt(): string {
    let prompt = "\nYour Supplies\n\n";
    for (const [kind, item] of this.context.vehicle.inventory.entries()) {
      const quantity =
        kind === ItemKind.CASH
          ? currencyFormat.format(item.quantity)
          : countFormat.format(item.quantity);
      prompt += `${item.name.toLowerCase().padEnd(NAME_COLUMN_WIDTH)} ${quantity.padStart(QUANTITY_COLUMN_WIDTH)}\n`;
    }
    return prompt;
  }

  protected onDialogResponse(): StateTransition {
    return Transitions.close();
  }
}
