export type StreamDescriptorResult =
  | { kind: 'ok'; xml: string; url: string }
  | { kind: 'not_found' };

export type PlaylistResult =
  | { kind: 'ok'; body: string; url: string }
  | { kind: 'forbidden'; status: number }
  | { kind: 'failed'; status: number };

/**
 * Per-station stream lookup against the upstream service. Implementations throw
 * UpstreamRejectedError when the token is refused.
 */
export interface StreamLookupPort {
  fetchStreamDescriptor(stationId: string, headers: Record<string, string>): Promise<StreamDescriptorResult>;
  createPlaylist(
    url: string,
    params: Record<string, string>,
    headers: Record<string, string>,
  ): Promise<PlaylistResult>;
}
