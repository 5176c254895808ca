export * from "./errors";

export * from "./store/SessionStore";
export * from "./store/MapSessionStore";

export * from "./serializer/Serializer";
export * from "./session/LockProvider";

export * from "./utils/time";
