export { BaseRequest } from "./base-request";
export { HttpRequest } from "./http-request";
export { WebSocketRequest } from "./websocket-request";
export type { WebSocketMessage } from "./websocket-request";
