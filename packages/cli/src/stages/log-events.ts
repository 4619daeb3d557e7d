import type { SimpleStage, StageDetails, WebRequestRegistry } from "@reqgate/core";

export type EventWriter = (stage: SimpleStage, message: string) => void;

export const describeRedirect = (details: StageDetails<"beforeRedirect">) =>
  `${details.method} ${details.url} -> ${details.redirectUrl} (${details.statusCode})`;

export const describeCompleted = (details: StageDetails<"completed">) =>
  `${details.method} ${details.url} ${details.statusCode}${details.fromCache ? " (cache)" : ""}`;

export const describeFailure = (details: StageDetails<"errorOccurred">) =>
  `${details.method} ${details.url} failed with net error ${details.netError}`;

export const attachEventLog = <C extends object>(
  registry: WebRequestRegistry<C>,
  write: EventWriter
) => {
  registry.onBeforeRedirect((details) => write("beforeRedirect", describeRedirect(details)));
  registry.onCompleted((details) => write("completed", describeCompleted(details)));
  registry.onErrorOccurred((details) => write("errorOccurred", describeFailure(details)));
};
