export { DispatchContext, DispatchKind } from "./contracts/DispatchContext";
export { HandlerDescriptor, HandlerKind } from "./contracts/HandlerDescriptor";
export { IHandle, INotificationHandler, IRequestHandler, handlerName, isHandler } from "./contracts/IHandle";
export { IHandlerFactory, MultiInstanceFactory, SingleInstanceFactory } from "./contracts/IHandlerFactory";
export { IMediator } from "./contracts/IMediator";
export { INotification } from "./contracts/INotification";
export { IRequest, MediatorRequest, ResponseOf } from "./contracts/IRequest";
export {
  HandlerAmbiguityError,
  HandlerExecutionError,
  HandlerNotFoundError,
  HandlerRegistrationError,
  HandlerResolutionError,
  MediatorError,
  OperationCanceledError,
  PublishError,
} from "./contracts/MediatorExceptions";
export { MessageType, isMessageType, messageTypeName, messageTypeOf } from "./contracts/MessageType";

export { DelegateHandlerFactory } from "./core/DelegateHandlerFactory";
export { HandlerDeclaration, NotificationHandlerFor, RequestHandlerFor, getHandlerDeclaration } from "./core/HandlerForAttribute";
export { HandlerFactoryFunc, HandlerRegistry } from "./core/HandlerRegistry";
export { Mediator } from "./core/Mediator";
export { MediatorBuilder } from "./core/MediatorBuilder";
export { MediatorLogger, MediatorOptions, MediatorOptionsInit, silentLogger } from "./core/MediatorOptions";
export { AsyncNotificationHandler, NotificationHandler } from "./core/NotificationHandler";
export { AsyncRequestHandler, RequestHandler } from "./core/RequestHandler";

export { IStrategy, IStrategyNotification, isStrategy } from "./strategies/IStrategy";
export { IMessageRequest, SendMoreRequestsStrategy } from "./strategies/SendMoreRequestsStrategy";
export { StrategyNotificationHandler, registerStrategyHandlers } from "./strategies/StrategyNotificationHandler";
