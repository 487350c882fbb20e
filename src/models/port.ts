/**
 * Serial port listing model.
 */

export interface SerialPortInfo {
  /** Device path to pass as `SerialSettings.path` */
  path: string;

  manufacturer?: string;

  serialNumber?: string;
}
