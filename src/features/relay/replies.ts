// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/replies`
 * Purpose: User-facing reply texts for the relay.
 * Scope: Constants and small formatters only. Does not send anything or decide which reply applies.
 * Invariants: Texts are markdown-safe for the transport's "markdown" format (code spans in backticks, links as [text](url))
 * Side-effects: none
 * Links: features/relay/services/*
 * @public
 */

export const RATE_LIMIT_DOCS_URL =
  "https://ai.google.dev/gemini-api/docs/rate-limits";

export const SELECT_MODEL_HINT =
  "\n\nUse a different model by using the `/select_model` command.";

export const TOO_LONG_HINT =
  "\n\nYour conversation history or input might be too long for the model. Try using `/reset`.";

export const REPLIES = {
  welcome: [
    "Hello! I relay your messages to a Google Gemini model.",
    "",
    "You can chat with me by sending text or photos (with captions).",
    "I remember our conversation history (up to model limits).",
    "",
    "Available commands:",
    "/start or /help - Show this message.",
    "/reset - Clear the current chat history.",
    "/set_api_key - Set your personal Gemini API key.",
    "/clear_api_key - Use the bot's default API key (if available).",
    "/current_settings - Show your active API key status and model.",
    "/list_models - List models available with your current API key.",
    "/select_model - Choose a model using buttons.",
    "",
    "Note: If you set a new API key or model, your chat history will be reset.",
  ].join("\n"),

  emptyMessage: "Please send some text to chat!",
  unsupportedContent: "Sorry, I can currently only process text and photos.",
  unknownCommand: "Unknown command. Use `/help` to see available commands.",
  unexpectedError: "An unexpected error occurred during processing.",
  imageError: "Sorry, I encountered an error processing the image.",

  storeUnavailable:
    "Database service is not available. Bot may not function correctly.",
  settingsUnavailable: "Error fetching your settings from the database.",
  historyUnavailable: "Error fetching chat history from the database.",
  providerNotConfigured:
    "AI service not available. The bot's default API key is missing, and you haven't set your own.\n\nPlease use `/set_api_key` to provide your key.",

  quotaCountSaveFailed: "Error saving message count. Please try again.",

  secretEmpty: "API key cannot be empty.",
  secretPermissionDenied:
    "Failed to validate API key: Permission Denied. Check if the key is correct and enabled for the Gemini API.",
  secretSettingsUnavailable: "Error fetching your settings before saving key.",
  secretSaveFailed: "Failed to save your API key to the database.",
  secretSet:
    "Your Gemini API key has been set successfully! Your chat history has been reset.",
  secretEntryInstructions: [
    "Okay, please send me your Google Gemini API key now.",
    "You can get your API key from Google AI Studio:",
    "1. Go to [https://aistudio.google.com/app/apikey](https://aistudio.google.com/app/apikey)",
    "2. Create a new API key (or use an existing one).",
    "3. Copy the key and paste it into a reply message here.",
    "_Setting a new key resets chat history and message count._",
    "Send `/cancel` to abort.",
  ].join("\n"),
  secretEntryUnavailable:
    "Could not start API key entry right now. Please try again later.",

  cancelNothing: "No active operation to cancel.",
  cancelDone: "Operation cancelled (Set API key).",

  resetDone: "Chat history cleared.",
  resetFailed: "Failed to clear your chat history in the database.",

  clearSecretAlreadyDefault: "You are already using the bot's default API key.",
  clearSecretNoDefault:
    "The bot does not have a default API key configured. You must provide your own via `/set_api_key`.",
  clearSecretDone:
    "Cleared your custom API key. Using the bot's default key now. Your chat history has been reset.",
  clearSecretFailed: "Failed to clear your custom API key in the database.",

  modelListUnavailable:
    "Could not fetch available models with your current API key. Check `/current_settings` or try `/set_api_key`.",
  modelListEmpty: "No generative models found with your current API key.",
  modelChoicesEmpty: "No models available to display as buttons.",
  modelChoicePrompt: "Please select a model:",
  modelSelectionInvalid: "Error: Invalid selection data.",
  modelSettingsUnavailable: "Error fetching your settings. Cannot set model.",
  modelSaveFailed: "Failed to set the model in the database.",

  noValidResponse: "Could not get a valid response from the model.",
  unrecognizedCandidates:
    "Received a non-text response from candidates without recognizable parts.",
  functionResponseReceived: "Model received a function response.",
  unexpectedProviderError:
    "An unexpected internal error occurred during AI interaction.",
  safetyBlocked:
    "Your input or the model's response was blocked by safety filters.",
} as const;

/** 1st, 2nd, 3rd, 4th, ..., 11th, 12th, 13th, 21st */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function quotaLimitReached(limit: number): string {
  return `You have reached the ${limit}-message limit for users without a custom API key.\n\nPlease set your own API key using \`/set_api_key\` to continue chatting without limits.`;
}

export function quotaOneRemaining(): string {
  return "You have 1 message remaining with the default API key.\n\nPlease use `/set_api_key` to provide your own Gemini API key to send more messages after this one.";
}

export function quotaFinalMessage(limit: number): string {
  return `This is your ${ordinal(limit)} and final message using the default API key.\n\nTo send more messages, please use \`/set_api_key\` to provide your own Gemini API key.`;
}

export function secretValidationFailed(detail: string): string {
  return `Failed to set API key: Could not initialize AI client or connect to service. Check your key. Error: ${detail}\n\nTry \`/set_api_key\` again or \`/cancel\`.`;
}

export function modelNotFound(model: string): string {
  return `The selected model \`${model}\` is not available or supported for conversations with your API key.\n\nPlease use \`/select_model\` to choose a different model.`;
}

export function modelList(displayNames: string[]): string {
  const lines = displayNames.map((name) => `- \`${name}\``);
  return [
    "Available Models (may vary based on API key/region):",
    "",
    ...lines,
    "",
    "Use `/select_model` to choose one.",
  ].join("\n");
}

export function rateLimited(model: string): string {
  return `Your request failed due to a quota limit being reached for the selected model (\`${model}\`).`;
}

export function badRequest(detail: string): string {
  return `Bad request to the AI model. Message: ${detail || "N/A"}`;
}

export function serverError(code: number): string {
  return `The AI service encountered a server error (Code: ${code}). Please try again later.`;
}

export function modelAlreadySet(model: string): string {
  return `Model is already set to \`${model}\`.`;
}

export function modelSet(model: string): string {
  return `Model set to \`${model}\` successfully! Your chat history has been reset.`;
}

export function settingModel(model: string): string {
  return `Setting model to ${model}...`;
}
