/** SDK name reported in `sdk.name` and the client identifier */
export const SDK_NAME = 'stackwire.node';

/** Keep in step with package.json */
export const SDK_VERSION = '1.0.0';

/** Value of the `platform` attribute */
export const SDK_PLATFORM = 'node';

/** `<sdkName>/<sdkVersion>`, sent as User-Agent and `sentry_client` */
export const CLIENT_IDENTIFIER = `${SDK_NAME}/${SDK_VERSION}`;
