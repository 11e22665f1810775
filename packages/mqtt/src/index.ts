export { MqttTransport, type MqttTransportEvents, type MqttTransportOptions } from "./transport";
