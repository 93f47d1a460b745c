/** Spotify answered with a non-success status. */
export const ERROR_SPOTIFY_HTTP = "E-SPOTIFY-HTTP" as const;
/** The JSON payload did not match the expected shape. */
export const ERROR_SPOTIFY_SCHEMA = "E-SPOTIFY-SCHEMA" as const;
/** The request failed before a response arrived, timeouts included. */
export const ERROR_SPOTIFY_NETWORK = "E-SPOTIFY-NETWORK" as const;
/** The token endpoint refused the credentials or the API rejected the token. */
export const ERROR_SPOTIFY_AUTH = "E-SPOTIFY-AUTH" as const;

export type SpotifyClientErrorCode =
  | typeof ERROR_SPOTIFY_HTTP
  | typeof ERROR_SPOTIFY_SCHEMA
  | typeof ERROR_SPOTIFY_NETWORK
  | typeof ERROR_SPOTIFY_AUTH;

/** Error thrown when the client cannot obtain a valid response from Spotify. */
export class SpotifyClientError extends Error {
  public readonly code: SpotifyClientErrorCode;
  public readonly status: number | null;

  constructor(
    message: string,
    options: {
      code: SpotifyClientErrorCode;
      status?: number | null;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "SpotifyClientError";
    this.code = options.code;
    this.status = options.status ?? null;
  }
}

/** Error thrown when an artist node cannot be mapped to a Spotify artist ID. */
export class SpotifyArtistSourceError extends Error {
  public readonly code = "E-SPOTIFY-ARTIST";
  public readonly hint = "add the node with its Spotify artist ID or use the exact artist name";
  public readonly details: { artist: string };

  constructor(artist: string) {
    super(`no Spotify artist ID is known for '${artist}'`);
    this.name = "SpotifyArtistSourceError";
    this.details = { artist };
  }
}
