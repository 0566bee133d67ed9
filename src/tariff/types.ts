export type Period = "peak" | "flat" | "valley";

export type TouBand = {
  readonly hours: readonly number[];
  readonly price: number; // currency per kWh
};

export type TouSchedule = {
  readonly peak: TouBand;
  readonly flat: TouBand;
  readonly valley: TouBand;
};

export type TariffSlot = {
  readonly period: Period;
  readonly price: number;
};
