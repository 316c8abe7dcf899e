/**
 * Run-time Node.js version guard for closure captures
 *
 * The serialized payload is read back with `node:v8`, whose wire format
 * follows the V8 release. The guard runs inside the container before
 * anything is deserialized.
 */

/**
 * Releases before this one are treated as a different serialization format
 */
export const FORMAT_BOUNDARY = { major: 20, minor: 0 } as const;

export const VERSION_GUARD_DEFINITION = `const _checkNodeVersion = (producer, consumer) => {
  const [producerMajor = 0, producerMinor = 0] = producer.split(".").map(Number);
  const [consumerMajor = 0, consumerMinor = 0] = consumer.split(".").map(Number);
  const beforeBoundary = (major, minor) =>
    major < ${FORMAT_BOUNDARY.major} || (major === ${FORMAT_BOUNDARY.major} && minor < ${FORMAT_BOUNDARY.minor});
  if (
    producerMajor !== consumerMajor ||
    consumerMinor < producerMinor ||
    beforeBoundary(producerMajor, producerMinor) !== beforeBoundary(consumerMajor, consumerMinor)
  ) {
    throw new Error(
      "Incompatible Node.js versions: the function was captured on Node.js " +
        producer +
        " but the container runs Node.js " +
        consumer +
        ". Use a base image with the same Node.js release or capture the function source instead."
    );
  }
  if (producerMinor !== consumerMinor) {
    process.stderr.write(
      "Warning: the function was captured on Node.js " +
        producer +
        " but the container runs Node.js " +
        consumer +
        ". Loading may fail.\\n"
    );
  }
};`;

/**
 * Guard definition plus the call checking the running version
 */
export const renderVersionGuard = (producerVersion: string): string =>
  `${VERSION_GUARD_DEFINITION}
_checkNodeVersion(${JSON.stringify(producerVersion)}, process.versions.node);`;
