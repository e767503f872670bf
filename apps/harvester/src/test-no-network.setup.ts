// Tests stub globalThis.fetch themselves; a request that slips through fails loudly.
function blockedNetwork(): never {
  throw new Error('Outbound network is disabled in tests')
}

globalThis.fetch = async () => blockedNetwork()
