// backend/services/shared/src/index.ts
export * from "./errors/ApiError";
export * from "./errors/problem";

export * from "./fields/Field";
export * from "./fields/fields";
export * from "./fields/validators";

export * from "./serializer/Serializer";

export * from "./viewset/actions";
export * from "./viewset/GenericViewSet";
export * from "./viewset/ModelViewSet";
export * from "./viewset/Blueprint";

export * from "./logger/Logger";
export * from "./base/ServiceBase";
export * from "./env/envHelpers";
export * from "./http/requestId";
export * from "./middleware/httpLogger";
export * from "./middleware/problemJson";
export * from "./health";
export * from "./app/createServiceApp";
