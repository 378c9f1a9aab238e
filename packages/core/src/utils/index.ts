export { Channel, ChannelClosedError } from "./channel.js";
export { OrderedSet } from "./ordered-set.js";
