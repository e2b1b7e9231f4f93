import { SetInterestCommand } from "./setInterest";
import { SetPositionCommand } from "./setPosition";
import { SetRotationCommand } from "./setRotation";

export * from "./commandArguments";
export * from "./setInterest";
export * from "./setPosition";
export * from "./setRotation";

export type ClientCommand = SetInterestCommand | SetPositionCommand | SetRotationCommand;
