// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export * from './lib/api.js';
export * from './lib/client.js';
export * from './lib/device.js';
export * from './lib/event-stream.js';
export * from './lib/tool-executor.js';
export * from './stores/chat-store.js';
export * from './stores/event-store.js';
