export { ChunkReader } from "./chunk-reader.js";
export {
	type AddressType,
	buildReply,
	readGreeting,
	readRequest,
	REP_ADDR_TYPE_NOT_SUPPORTED,
	REP_COMMAND_NOT_SUPPORTED,
	REP_CONNECTION_REFUSED,
	REP_FAILURE,
	REP_HOST_UNREACHABLE,
	REP_NETWORK_UNREACHABLE,
	REP_NOT_ALLOWED,
	REP_SUCCESS,
	SocksProtocolError,
	type SocksRequest,
} from "./protocol.js";
export { createSocksServer, type HostResolver, type SocksServer, type SocksServerOptions } from "./socks-server.js";
