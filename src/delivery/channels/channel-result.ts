import { ChannelHttpError } from '../delivery.error';
import type { ChannelResult } from '../interfaces/delivery-channel.interface';

export const CHANNEL_OK: ChannelResult = {
  success: true,
  httpStatus: null,
  errorMessage: null,
};

/** Maps anything a channel transport threw to a failed attempt */
export function channelFailure(error: unknown): ChannelResult {
  if (error instanceof ChannelHttpError) {
    return {
      success: false,
      httpStatus: error.statusCode,
      errorMessage: error.message,
    };
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { success: false, httpStatus: null, errorMessage: 'Request timeout' };
  }
  return {
    success: false,
    httpStatus: null,
    errorMessage: (error instanceof Error ? error.message : 'Unknown error').slice(
      0,
      200,
    ),
  };
}
