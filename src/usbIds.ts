import type { PortInfo } from "@serialport/bindings-cpp";

// USB-UART bridges found on NodeMCU style boards, as VID -> PIDs
const supportedDevices = new Map<number, number[]>([
  // Silicon Labs CP210x
  [0x10c4, [0xea60, 0xea70]],
  // WCH CH340 / CH341 / CH9102
  [0x1a86, [0x7523, 0x5523, 0x55d4]],
  // FTDI FT232R / FT231X
  [0x0403, [0x6001, 0x6015]],
  // Espressif native USB (ESP32-S2/S3/C3)
  [0x303a, [0x1001, 0x0002]],
]);

export function isUsbDeviceSupported(port: PortInfo): boolean {
  if (port.vendorId === undefined || port.productId === undefined) {
    return false;
  }
  const vid = Number(`0x${port.vendorId}`);
  const pid = Number(`0x${port.productId}`);

  return supportedDevices.get(vid)?.includes(pid) ?? false;
}
