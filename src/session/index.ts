export { ProxySession, type ProxySessionDeps } from "./proxySession";
export { parseProxy, parseProxyList, splitProxyList, InvalidProxyError } from "./proxyParsing";
export { createDispatcher, readCaCert, type DispatcherFactory } from "./dispatchers";
