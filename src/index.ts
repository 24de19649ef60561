export * from './classes/singleconnectionrpc/SingleConnectionRpcServer.class';
export * from './classes/singleconnectionrpc/SingleConnectionRpcProxy.class';
export * from './classes/functionregistry/FunctionRegistry.class';
export * from './classes/framedsocket/FramedSocket.class';
export * from './classes/wireprotocol/WireProtocol';
export * from './classes/serializer/JsonSerializer.class';
export * from './classes/serializer/MsgpackSerializer.class';
export * from './classes/serializer/SerializedErrors';
export * from './classes/rpcerrors/RpcErrors.class';
export * from './classes/rpcconfig/RpcConfig';
export * from './classes/rpclogger/RpcLogger.class';
export * from './classes/asynclock/AsyncLock.class';
export type * from './types/project_types';
