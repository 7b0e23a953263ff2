import { X, HelpCircle, BookOpen, Info } from 'lucide-react';
import { useState } from 'react';
import { listEvents } from '../lib/eventCatalog';

interface HelpModalProps {
    isOpen: boolean;
    onClose: () => void;
}

type Tab = 'help' | 'glossary' | 'acknowledgements';

const TABS: { id: Tab; label: string; icon: typeof HelpCircle }[] = [
    { id: 'help', label: 'Help', icon: HelpCircle },
    { id: 'glossary', label: 'Glossary', icon: BookOpen },
    { id: 'acknowledgements', label: 'Data Source', icon: Info }
];

export function HelpModal({ isOpen, onClose }: HelpModalProps) {
    const [activeTab, setActiveTab] = useState<Tab>('help');

    if (!isOpen) return null;

    return (
        <div className="fixed inset-0 z-50 bg-background/80 backdrop-blur-sm flex items-center justify-center p-4">
            <div role="dialog" aria-label="Help & Information" className="bg-card border border-border rounded-lg shadow-lg max-w-2xl w-full flex flex-col max-h-[90vh] animate-in zoom-in-95 duration-200">
                <div className="flex justify-between items-center p-6 border-b border-border">
                    <h2 className="text-xl font-bold flex items-center gap-2">
                        <HelpCircle className="h-5 w-5" /> Help & Information
                    </h2>
                    <button onClick={onClose} title="Close help" className="text-muted-foreground hover:text-foreground">
                        <X className="h-5 w-5" />
                    </button>
                </div>

                <div className="flex border-b border-border">
                    {TABS.map(({ id, label, icon: Icon }) => (
                        <button
                            key={id}
                            onClick={() => setActiveTab(id)}
                            className={`flex-1 py-3 text-sm font-medium border-b-2 transition-colors flex items-center justify-center gap-2 ${activeTab === id
                                    ? 'border-primary text-primary'
                                    : 'border-transparent text-muted-foreground hover:text-foreground hover:bg-muted/50'
                                }`}
                        >
                            <Icon className="h-4 w-4" /> {label}
                        </button>
                    ))}
                </div>

                <div className="p-6 overflow-y-auto custom-scrollbar">
                    {activeTab === 'help' && (
                        <div className="space-y-4 text-sm text-muted-foreground">
                            <p className="text-foreground text-base font-medium">
                                How to use this app
                            </p>
                            <ol className="list-decimal ml-5 space-y-2">
                                <li><strong className="text-foreground">Enter API Key:</strong> Provide your NASA API Key.</li>
                                <li><strong className="text-foreground">Select Event Type:</strong> Choose the space weather event you're interested in.</li>
                                <li><strong className="text-foreground">Set Date Range:</strong> Specify the start and end dates for the data visualization.</li>
                                <li><strong className="text-foreground">Fetch Data:</strong> Click the "Fetch Data" button to retrieve and visualize the data.</li>
                                <li><strong className="text-foreground">View Details:</strong> Expand the raw JSON data or raw data sections to inspect the data.</li>
                                <li><strong className="text-foreground">Explore:</strong> Hover over the chart to see the value for each day.</li>
                            </ol>
                            <div className="bg-muted p-3 rounded-md border border-border text-xs">
                                <strong>Note:</strong> Responses are cached in your browser for an hour, so repeating the same query does not spend your API quota.
                            </div>
                        </div>
                    )}

                    {activeTab === 'glossary' && (
                        <dl className="space-y-3 text-sm">
                            {listEvents().map(event => (
                                <div key={event.code}>
                                    <dt className="font-semibold text-foreground">{event.code}</dt>
                                    <dd className="text-muted-foreground">{event.description}</dd>
                                </div>
                            ))}
                        </dl>
                    )}

                    {activeTab === 'acknowledgements' && (
                        <div className="space-y-6 text-sm text-muted-foreground">
                            <section>
                                <h3 className="text-foreground font-semibold mb-2">Data Source</h3>
                                <p>
                                    All event data comes from the <a href="https://kauai.ccmc.gsfc.nasa.gov/DONKI/" className="text-primary hover:underline" target="_blank" rel="noreferrer">Space Weather Database Of Notifications, Knowledge, Information (DONKI)</a>, served through the NASA Open APIs at api.nasa.gov.
                                </p>
                            </section>

                            <section>
                                <h3 className="text-foreground font-semibold mb-2">Technology Stack</h3>
                                <p>
                                    Built with React, TypeScript, Tailwind CSS, and Recharts.
                                </p>
                            </section>
                        </div>
                    )}
                </div>

                <div className="p-4 border-t border-border bg-card/50 flex justify-end rounded-b-lg">
                    <button onClick={onClose} className="px-4 py-2 bg-primary text-primary-foreground rounded-md hover:bg-primary/90 transition-colors">
                        Close
                    </button>
                </div>
            </div>
        </div>
    );
}
