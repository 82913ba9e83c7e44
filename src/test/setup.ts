// Set test environment variables
process.env.NODE_ENV = 'test'

// Reset mocks between tests
beforeEach(() => {
  jest.clearAllMocks()
})
