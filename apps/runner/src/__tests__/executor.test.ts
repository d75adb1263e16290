import { describe, expect, it } from "vitest";
import { ConversationOrchestrator } from "../conversation/executor.js";
import type { ConversationObserver } from "../conversation/executor.js";
import { PersonaUserAgent } from "../conversation/persona-user.js";
import { ScriptedCompletion, ScriptedGateway, decision, failed, goal, goalWith, ok, persona } from "./fakes.js";

function userWith(replies: string[], userGoal = goal) {
  return new PersonaUserAgent(new ScriptedCompletion(replies), persona, userGoal);
}

describe("ConversationOrchestrator", () => {
  it("runs until the goal is reached", async () => {
    const user = userWith(["What is a reset link?", decision("Thanks, and how long is it valid?"), decision("Great")]);
    const gateway = new ScriptedGateway([ok("A one-time URL.", 120), ok("One hour.", 80)]);

    const outcome = await new ConversationOrchestrator(user, gateway, 10).run();

    expect(outcome).toEqual({
      turns: 2,
      stop_reason: "user_ended",
      response_times: [120, 80],
      errors: [],
    });
    expect(gateway.calls).toEqual([
      { message: "What is a reset link?", priorTurns: [] },
      {
        message: "Thanks, and how long is it valid?",
        priorTurns: [
          { role: "user", content: "What is a reset link?" },
          { role: "assistant", content: "A one-time URL." },
        ],
      },
    ]);
    const state = user.getState();
    expect(state.messages.map((m) => m.role)).toEqual(["user", "assistant", "user", "assistant", "user"]);
    expect(state.user_satisfaction).toBe(0.7);
  });

  it("records each assistant reply exactly once", async () => {
    const user = userWith(["Hi", decision("More please")]);
    const gateway = new ScriptedGateway([ok("Hello")]);

    await new ConversationOrchestrator(user, gateway, 1).run();

    const assistantMessages = user.getState().messages.filter((m) => m.role === "assistant");
    expect(assistantMessages.map((m) => m.content)).toEqual(["Hello"]);
  });

  it("ends on the first transport error without retrying", async () => {
    const user = userWith(["Hi"]);
    const gateway = new ScriptedGateway([failed("Request timeout"), ok("never sent")]);
    const orchestrator = new ConversationOrchestrator(user, gateway, 10);

    const outcome = await orchestrator.run();

    expect(outcome).toEqual({ turns: 0, stop_reason: "transport_error", response_times: [], errors: ["Request timeout"] });
    expect(gateway.calls).toHaveLength(1);
    expect(orchestrator.errors).toEqual(["Request timeout"]);
    expect(user.getState().messages).toHaveLength(1);
  });

  it("stops at max turns", async () => {
    const user = userWith(["Hi", decision("Tell me more")], goalWith({ expected_turns: 10 }));
    const gateway = new ScriptedGateway([ok("Hello")]);

    const outcome = await new ConversationOrchestrator(user, gateway, 1).run();

    expect(outcome.stop_reason).toBe("max_turns");
    expect(outcome.turns).toBe(1);
  });

  it("stops when the user does not want to continue", async () => {
    const user = userWith(["Hi", decision("Never mind", false, 0.1)], goalWith({ expected_turns: 10 }));
    const gateway = new ScriptedGateway([ok("Hello")]);

    const outcome = await new ConversationOrchestrator(user, gateway, 5).run();

    expect(outcome.stop_reason).toBe("user_ended");
    expect(outcome.turns).toBe(1);
    expect(user.getState().messages.at(-1)?.content).toBe("Never mind");
    expect(user.getState().user_satisfaction).toBe(0.1);
  });

  it("treats an empty next message as the end of the conversation", async () => {
    const user = userWith(["Hi", "CONTINUE: true\nSATISFACTION: 0.6"], goalWith({ expected_turns: 10 }));
    const gateway = new ScriptedGateway([ok("Hello"), ok("unused")]);

    const outcome = await new ConversationOrchestrator(user, gateway, 5).run();

    expect(outcome.stop_reason).toBe("user_ended");
    expect(gateway.calls).toHaveLength(1);
    expect(user.getState().messages.map((m) => m.role)).toEqual(["user", "assistant"]);
  });

  it("reports progress to the observer", async () => {
    const events: string[] = [];
    const observer: ConversationObserver = {
      onUserMessage: (text) => events.push(`user:${text}`),
      onAssistantMessage: (text, ms) => events.push(`assistant:${text}:${ms}`),
      onTransportError: (error) => events.push(`error:${error}`),
      onStop: (reason, turns) => events.push(`stop:${reason}:${turns}`),
    };
    const user = userWith(["Hi", decision("Again?")], goalWith({ expected_turns: 10 }));
    const gateway = new ScriptedGateway([ok("Hello", 40), failed("API responded with status 502")]);

    await new ConversationOrchestrator(user, gateway, 5, observer).run();

    expect(events).toEqual([
      "user:Hi",
      "assistant:Hello:40",
      "user:Again?",
      "error:API responded with status 502",
      "stop:transport_error:1",
    ]);
  });
});
