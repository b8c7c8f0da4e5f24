// SPDX-License-Identifier: Apache-2.0
// api/src/pubsub/googlePubSub.ts
import { PubSub, type Topic } from "@google-cloud/pubsub";
import type { BrokerClient } from "./publisher.js";

/**
 * BrokerClient over @google-cloud/pubsub. Topic handles are cached so the
 * client's batching state is shared by all requests.
 */
export function createGooglePubSubClient(projectId: string): BrokerClient {
  const pubsub = new PubSub({ projectId });
  const topics = new Map<string, Topic>();

  const topicFor = (path: string) => {
    let t = topics.get(path);
    if (!t) {
      // no batching delay: one webhook, one message, sent now
      t = pubsub.topic(path, { batching: { maxMessages: 1, maxMilliseconds: 0 } });
      topics.set(path, t);
    }
    return t;
  };

  return {
    publish: (path, data, attributes) => topicFor(path).publishMessage({ data, attributes }),
    close: async () => {
      await Promise.all([...topics.values()].map((t) => t.flush()));
      await pubsub.close();
    },
  };
}
