export * from "./drivers/stream-connection.js";
export * from "./drivers/xbee-byte-buffer.js";
export * from "./drivers/xbee-connection.js";
export * from "./drivers/xbee-data-reader.js";
export * from "./drivers/xbee-driver.js";
export * from "./drivers/xbee-packets-queue.js";
export * from "./drivers/xbee-parser.js";
export * from "./utils/listener-list.js";
export * from "./utils/logger.js";
export * from "./xbee/address.js";
export * from "./xbee/checksum.js";
export * from "./xbee/consts.js";
export * from "./xbee/errors.js";
export * from "./xbee/escaping.js";
export * from "./xbee/frame.js";
export * from "./xbee/frame-types.js";
export * from "./xbee/io-sample.js";
export * from "./xbee/messages.js";
export * from "./xbee/options.js";
export * from "./xbee/packet.js";
export * from "./xbee/packets/at-command.js";
export * from "./xbee/packets/ip.js";
export * from "./xbee/packets/receive.js";
export * from "./xbee/packets/relay.js";
export * from "./xbee/packets/transmit.js";
export * from "./xbee/packets/unknown.js";
export * from "./xbee/statuses.js";
export * from "./xbee/utils.js";
