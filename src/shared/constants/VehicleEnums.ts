/**
 * Vehicle and inventory enumerations.
 *
 * @module shared/constants/VehicleEnums
 */

/**
 * Inventory item kinds. Declaration order is the display order of the
 * supplies screen.
 */
export enum ItemKind {
  CASH = "cash",
  OXEN = "oxen",
  FOOD = "food",
  CLOTHING = "clothing",
  AMMO = "ammo",
  WHEEL = "wheel",
  AXLE = "axle",
  TONGUE = "tongue",
}

/**
 * Travel pace selected by the player.
 */
export enum TravelPace {
  STEADY = "steady",
  STRENUOUS = "strenuous",
  GRUELING = "grueling",
}
