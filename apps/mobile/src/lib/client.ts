// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { CoachApiClient, type ApiAuth } from './api.js';

let client: CoachApiClient | null = null;

export function setCoachClientAuth(auth: ApiAuth): CoachApiClient {
  if (!client) {
    client = new CoachApiClient(auth);
  } else {
    client.setAuth(auth);
  }
  return client;
}

export function getCoachClient(): CoachApiClient {
  if (!client) {
    throw new Error('Coach client is not initialized.');
  }
  return client;
}

export function clearCoachClient(): void {
  client = null;
}
