import type { CoreMessage } from "ai";
import type { ChatMessage } from "./types";

export function toCoreMessages(messages: ChatMessage[]): CoreMessage[] {
    return messages.map((message): CoreMessage => {
        switch (message.role) {
            case "system":
                return { role: "system", content: message.content };
            case "assistant":
                return { role: "assistant", content: message.content };
            default:
                return { role: "user", content: message.content };
        }
    });
}
