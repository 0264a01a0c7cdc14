/** Failed communication with the MVG API or a response we could not understand. */
export class MvgApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MvgApiError";
  }
}

/** A global station id that does not look like `de:<region>:<stop>`. */
export class InvalidStationIdError extends Error {
  readonly stationId: string;

  constructor(stationId: string) {
    super("Invalid format of global station id.");
    this.name = "InvalidStationIdError";
    this.stationId = stationId;
  }
}

export const safeErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message;
  return JSON.stringify(error);
};
