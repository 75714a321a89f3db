import ChatInterface from './components/ChatInterface';
import DatasetInfo from './components/DatasetInfo';

function App() {
  return (
    <div className="min-h-screen bg-gradient-to-br from-blue-50 to-indigo-100">
      <div className="container mx-auto px-4 py-8">
        <div className="max-w-4xl mx-auto">
          <div className="bg-white rounded-lg shadow-xl p-8">
            <header className="text-center mb-8">
              <div className="flex items-center justify-center gap-3 mb-3">
                <svg className="w-8 h-8 text-blue-600" fill="none" stroke="currentColor" viewBox="0 0 24 24">
                  <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M8 10h.01M12 10h.01M16 10h.01M9 16H5a2 2 0 01-2-2V6a2 2 0 012-2h14a2 2 0 012 2v8a2 2 0 01-2 2h-5l-5 5v-5z" />
                </svg>
                <h1 className="text-4xl font-bold text-gray-800">
                  AI Tool Advisor
                </h1>
              </div>
              <p className="text-gray-600 text-lg">
                Chat with a catalogue of AI tools and get grounded recommendations
              </p>
            </header>

            <DatasetInfo />
            <ChatInterface />
          </div>
        </div>
      </div>
    </div>
  );
}

export default App;
