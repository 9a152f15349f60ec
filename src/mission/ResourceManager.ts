import type { VehicleProfile } from '../core/Config';

const clamp = (v: number) => Math.max(0, Math.min(100, v));

/**
 * Уровни батареи и моющей жидкости в процентах. Значения зажаты в [0, 100];
 * растут только через recharge()/refill().
 */
export class ResourceManager {
  private _battery = 100;
  private _fluid = 100;

  constructor(private readonly thresholds: VehicleProfile['thresholds']) {}

  get battery(): number { return this._battery; }
  get fluid(): number { return this._fluid; }

  depleteBattery(amount: number): void {
    this._battery = clamp(this._battery - Math.max(0, amount));
  }

  depleteFluid(amount: number): void {
    this._fluid = clamp(this._fluid - Math.max(0, amount));
  }

  recharge(): void { this._battery = 100; }
  refill(): void { this._fluid = 100; }

  isBatteryCritical(): boolean { return this._battery < this.thresholds.batteryCritical; }
  isBatteryLow(): boolean { return this._battery < this.thresholds.batteryLow; }
  isFluidLow(): boolean { return this._fluid < this.thresholds.fluidLow; }
}
