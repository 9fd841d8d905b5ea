// Use global registry to preserve identity across bundles/chunks
export const APPEND = Symbol.for('hibiki.channel.append');
export const REMOVE = Symbol.for('hibiki.channel.remove');
export const HAS_LISTENER = Symbol.for('hibiki.channel.has');
export const ATTACH_UPSTREAM = Symbol.for('hibiki.channel.upstream');
