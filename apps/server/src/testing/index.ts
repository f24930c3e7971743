// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export { ScriptedModel, type ScriptedReply } from './scripted-model.js';
export { listenOnEphemeralPort } from './http.js';
